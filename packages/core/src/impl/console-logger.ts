import type { AlertSink, Logger, OperatorAlert } from '../interfaces/logger';

/**
 * Logger that prefixes console output with a component tag, e.g. "[Engine]".
 */
export function createLogger(component: string, base: Logger = console): Logger {
  const prefix = `[${component}]`;
  return {
    info: (message, ...args) => base.info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => base.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => base.error(`${prefix} ${message}`, ...args),
  };
}

/**
 * Default alert sink: writes alerts to a logger.
 */
export class LoggerAlertSink implements AlertSink {
  constructor(private readonly logger: Logger = createLogger('Alert')) {}

  alert(alert: OperatorAlert): void {
    const target = [alert.instanceId && `instance=${alert.instanceId}`, alert.contactId && `contact=${alert.contactId}`]
      .filter(Boolean)
      .join(' ');
    this.logger.error(`${alert.severity.toUpperCase()} ${alert.code}: ${alert.message}${target ? ` (${target})` : ''}`);
  }
}

/**
 * Collects alerts in memory. Handy in tests.
 */
export class MemoryAlertSink implements AlertSink {
  readonly alerts: OperatorAlert[] = [];

  alert(alert: OperatorAlert): void {
    this.alerts.push(alert);
  }
}
