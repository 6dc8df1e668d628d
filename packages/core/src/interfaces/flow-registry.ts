import type { FlowDefinition } from '../types/flow';
import type { ValidationIssue } from '../types/errors';

/**
 * Registry of flow definitions.
 */
export interface FlowRegistry {
  /** Register a flow (validates first) */
  register(flow: FlowDefinition): void;

  /** Remove every version of a flow */
  unregister(id: string): boolean;

  /** Get flow by ID (latest version if no version specified) */
  get(id: string, version?: string): FlowDefinition | undefined;

  has(id: string): boolean;

  flowIds(): string[];

  /** Latest version of every flow */
  list(): FlowDefinition[];

  /** All versions of a flow, newest first */
  versions(id: string): string[];

  /** Validate without registering */
  validate(flow: FlowDefinition): ValidationIssue[];
}

/** A persisted flow version */
export interface StoredFlow {
  readonly flow: FlowDefinition;
  /** false once the flow has been undefined */
  readonly active: boolean;
}

/**
 * Durable copy of defined flows (optional).
 * Every version is kept so instances on old versions survive a restart.
 */
export interface FlowStore {
  save(flow: FlowDefinition): Promise<void>;
  /** Mark every version of a flow undefined */
  deactivate(id: string): Promise<boolean>;
  list(): Promise<StoredFlow[]>;
}
