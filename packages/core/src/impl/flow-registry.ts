import type { FlowDefinition } from '../types/flow';
import type { FlowRegistry } from '../interfaces/flow-registry';
import type { ValidationIssue } from '../types/errors';
import { FlowValidationError } from '../types/errors';
import { validateFlow } from '../utils/validation';

function compareVersions(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true });
}

/**
 * Flows stay readable by (id, version) after unregister so instances already
 * running can finish; they no longer match triggers or appear in list().
 */
export class DefaultFlowRegistry implements FlowRegistry {
  private flows = new Map<string, Map<string, FlowDefinition>>();
  private latest = new Map<string, string>();

  constructor(private readonly knownHandler?: (type: string) => boolean) {}

  register(flow: FlowDefinition): void {
    const issues = this.validate(flow);
    if (issues.some(i => i.severity === 'error')) {
      throw new FlowValidationError(flow.id, issues);
    }

    let versions = this.flows.get(flow.id);
    if (!versions) {
      versions = new Map();
      this.flows.set(flow.id, versions);
    }

    if (versions.has(flow.version) && this.isActive(flow.id)) {
      throw new FlowValidationError(flow.id, [
        { path: 'version', message: `Flow "${flow.id}@${flow.version}" already registered`, severity: 'error' },
      ]);
    }

    versions.set(flow.version, flow);

    const current = this.latest.get(flow.id);
    if (!current || compareVersions(flow.version, current) >= 0 || !this.isActive(flow.id)) {
      this.latest.set(flow.id, flow.version);
    }
  }

  unregister(id: string): boolean {
    return this.latest.delete(id);
  }

  get(id: string, version?: string): FlowDefinition | undefined {
    const versions = this.flows.get(id);
    if (!versions) return undefined;
    if (version) return versions.get(version);
    const latest = this.latest.get(id);
    return latest ? versions.get(latest) : undefined;
  }

  has(id: string): boolean {
    return this.isActive(id);
  }

  flowIds(): string[] {
    return [...this.latest.keys()];
  }

  list(): FlowDefinition[] {
    const result: FlowDefinition[] = [];
    for (const [id, version] of this.latest) {
      const flow = this.flows.get(id)?.get(version);
      if (flow) result.push(flow);
    }
    return result;
  }

  versions(id: string): string[] {
    return [...(this.flows.get(id)?.keys() ?? [])].sort((a, b) => compareVersions(b, a));
  }

  validate(flow: FlowDefinition): ValidationIssue[] {
    return validateFlow(flow, { knownHandler: this.knownHandler });
  }

  private isActive(id: string): boolean {
    return this.latest.has(id);
  }
}
