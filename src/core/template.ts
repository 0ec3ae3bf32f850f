import type { RunContext } from './types.js';

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_.]*)\}/g;

function lookup(vars: RunContext, path: string): unknown {
  let current: unknown = vars;
  for (const key of path.split('.')) {
    if (current === null || typeof current !== 'object' || !(key in current)) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Replaces `{name}` and `{nested.name}` placeholders with values from `vars`.
 * Unknown placeholders are left as written.
 */
export function renderTemplate(template: string, vars: RunContext = {}): string {
  return template.replace(PLACEHOLDER, (match, path: string) => {
    const value = lookup(vars, path);
    if (value === undefined || value === null) return match;
    return typeof value === 'string' ? value : JSON.stringify(value);
  });
}
