import { getPath } from '../utils';
import type { PredicateScope } from './predicates';

/**
 * Resolve `${path}` references in step params.
 *
 * A string that is exactly one reference keeps the referenced value's type;
 * references embedded in text are stringified (missing values become '').
 */
export function interpolate(template: unknown, scope: PredicateScope): unknown {
  if (typeof template === 'string') {
    const full = template.match(/^\$\{([^}]+)\}$/);
    if (full) return getPath(scope, full[1].trim());
    return template.replace(/\$\{([^}]+)\}/g, (_, p: string) => {
      const v = getPath(scope, p.trim());
      if (v === undefined || v === null) return '';
      return typeof v === 'object' ? JSON.stringify(v) : String(v);
    });
  }

  if (Array.isArray(template)) {
    return template.map(t => interpolate(t, scope));
  }

  if (template && typeof template === 'object') {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(template)) {
      result[k] = interpolate(v, scope);
    }
    return result;
  }

  return template;
}

export function resolveParams(
  params: Record<string, unknown> | undefined,
  scope: PredicateScope
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(params ?? {})) {
    result[k] = interpolate(v, scope);
  }
  return result;
}
