import type { Application } from 'express';
import type { Engine, Logger } from '@tidewater/core';

/**
 * Services held by the ServiceContainer, by token.
 */
export interface ServiceMap {
  engine: Engine;
  logger: Logger;
  app: Application;
}

/**
 * Service tokens for dependency injection.
 */
export const ServiceTokens = {
  Engine: 'engine',
  Logger: 'logger',
  ExpressApp: 'app',
} as const satisfies Record<string, keyof ServiceMap>;

export type ServiceToken = keyof ServiceMap;
