import type { ActionHandler, HandlerMetadata } from './action-handler';

/**
 * Registry of action handlers.
 */
export interface ActionRegistry {
  register(handler: ActionHandler): void;
  registerAll(handlers: ActionHandler[]): void;
  get(type: string): ActionHandler | undefined;
  has(type: string): boolean;
  types(): string[];
  unregister(type: string): boolean;
  getMetadata(type: string): HandlerMetadata | undefined;
  getAllMetadata(): HandlerMetadata[];
}
