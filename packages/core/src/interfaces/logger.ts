export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface OperatorAlert {
  readonly severity: 'error' | 'critical';
  readonly code: string;
  readonly message: string;
  readonly instanceId?: string;
  readonly contactId?: string;
  readonly details?: unknown;
}

/**
 * Operator-facing channel for failed instances and scheduler halts.
 */
export interface AlertSink {
  alert(alert: OperatorAlert): void;
}
