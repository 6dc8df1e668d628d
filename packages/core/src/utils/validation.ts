import type { FlowDefinition, RetryPolicy, Step } from '../types/flow';
import type { Condition } from '../types/predicate';
import type { ValidationIssue } from '../types/errors';
import { validatePredicate } from '../engine/predicates';
import { parseWallClock } from '../engine/wall-clock';

export interface ValidateFlowOptions {
  /** Reports unknown action handlers when provided */
  knownHandler?: (type: string) => boolean;
}

export function validateFlow(flow: FlowDefinition, options: ValidateFlowOptions = {}): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (!flow.id) issues.push({ path: 'id', message: 'Required', severity: 'error' });
  if (!flow.version) issues.push({ path: 'version', message: 'Required', severity: 'error' });

  if (!flow.trigger) {
    issues.push({ path: 'trigger', message: 'Required', severity: 'error' });
  } else {
    const t = flow.trigger;
    switch (t.type) {
      case 'now':
        if (!t.segmentId) issues.push({ path: 'trigger.segmentId', message: 'Required', severity: 'error' });
        break;
      case 'at':
        if (!t.segmentId) issues.push({ path: 'trigger.segmentId', message: 'Required', severity: 'error' });
        if (!Number.isFinite(t.at)) issues.push({ path: 'trigger.at', message: 'Must be an epoch timestamp', severity: 'error' });
        break;
      case 'event':
        if (!t.eventType) issues.push({ path: 'trigger.eventType', message: 'Required', severity: 'error' });
        if (t.where) issues.push(...validatePredicate(t.where, 'trigger.where'));
        break;
      case 'property':
        if (!t.key) issues.push({ path: 'trigger.key', message: 'Required', severity: 'error' });
        if (t.where) issues.push(...validatePredicate(t.where, 'trigger.where'));
        break;
      default:
        issues.push({ path: 'trigger.type', message: 'Unknown trigger type', severity: 'error' });
    }
  }

  if (flow.goal) issues.push(...validateCondition(flow.goal, 'goal'));

  if (!Array.isArray(flow.steps) || flow.steps.length === 0) {
    issues.push({ path: 'steps', message: 'At least one step required', severity: 'error' });
    return issues;
  }

  validateSteps(flow.steps, 'steps', flow, options, issues);
  return issues;
}

function validateSteps(
  steps: readonly Step[],
  path: string,
  flow: FlowDefinition,
  options: ValidateFlowOptions,
  issues: ValidationIssue[]
): void {
  steps.forEach((step, i) => {
    const at = `${path}.${i}`;
    switch (step.type) {
      case 'action':
        if (!step.handler) {
          issues.push({ path: `${at}.handler`, message: 'Required', severity: 'error' });
        } else if (options.knownHandler && !options.knownHandler(step.handler)) {
          issues.push({ path: `${at}.handler`, message: `Unknown handler "${step.handler}"`, severity: 'error' });
        }
        if (step.retry) issues.push(...validateRetry(step.retry, `${at}.retry`));
        break;

      case 'decision':
        if (!Array.isArray(step.branches)) {
          issues.push({ path: `${at}.branches`, message: 'Must be an array', severity: 'error' });
          break;
        }
        if (step.branches.length === 0 && !step.otherwise?.length) {
          issues.push({ path: `${at}.branches`, message: 'Decision has no branches', severity: 'warning' });
        }
        step.branches.forEach((branch, b) => {
          issues.push(...validatePredicate(branch.when, `${at}.branches.${b}.when`));
          validateSteps(branch.steps ?? [], `${at}.branches.${b}.steps`, flow, options, issues);
        });
        if (step.otherwise) validateSteps(step.otherwise, `${at}.otherwise`, flow, options, issues);
        break;

      case 'delay': {
        const d = step.delay;
        if (!d) {
          issues.push({ path: `${at}.delay`, message: 'Required', severity: 'error' });
        } else if (d.kind === 'relative') {
          if (!Number.isFinite(d.ms) || d.ms < 0) {
            issues.push({ path: `${at}.delay.ms`, message: 'Must be a non-negative number', severity: 'error' });
          }
        } else if (d.kind === 'local') {
          if (typeof d.at !== 'string' || !parseWallClock(d.at)) {
            issues.push({ path: `${at}.delay.at`, message: `Unrecognized wall-clock time "${String(d.at)}"`, severity: 'error' });
          }
        } else if (d.kind === 'event') {
          issues.push(...validateCondition(d.until, `${at}.delay.until`));
        } else {
          issues.push({ path: `${at}.delay.kind`, message: 'Unknown delay kind', severity: 'error' });
        }
        break;
      }

      default:
        issues.push({ path: `${at}.type`, message: 'Unknown step type', severity: 'error' });
    }
  });
}

function validateCondition(condition: Condition, path: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (condition.on === 'event') {
    if (!condition.eventType) issues.push({ path: `${path}.eventType`, message: 'Required', severity: 'error' });
  } else if (condition.on !== 'property') {
    issues.push({ path: `${path}.on`, message: 'Must be "event" or "property"', severity: 'error' });
  }
  if (condition.where) issues.push(...validatePredicate(condition.where, `${path}.where`));
  return issues;
}

function validateRetry(retry: RetryPolicy, path: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (retry.maxAttempts !== undefined && (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1)) {
    issues.push({ path: `${path}.maxAttempts`, message: 'Must be an integer >= 1', severity: 'error' });
  }
  if (retry.backoffMs !== undefined && retry.backoffMs < 0) {
    issues.push({ path: `${path}.backoffMs`, message: 'Must be >= 0', severity: 'error' });
  }
  if (retry.backoffMultiplier !== undefined && retry.backoffMultiplier < 1) {
    issues.push({ path: `${path}.backoffMultiplier`, message: 'Must be >= 1', severity: 'error' });
  }
  return issues;
}
