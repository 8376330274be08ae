// Option parsing helpers shared by the commands

import { ValidationError } from '../../core/errors.js';

/**
 * Commander accumulator for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Parses `key=value` pairs; a key given more than once collects a list
 *
 * @throws ValidationError for pairs without `=` or with an empty key
 */
export function parseAssignments(pairs: readonly string[], field: string): Record<string, string | string[]> {
  const result = new Map<string, string | string[]>();

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    const key = index < 0 ? '' : pair.slice(0, index).trim();
    if (!key) {
      throw new ValidationError(`Expected key=value, got "${pair}"`, field);
    }

    const value = pair.slice(index + 1);
    const existing = result.get(key);

    if (existing === undefined) {
      result.set(key, value);
    } else if (typeof existing === 'string') {
      result.set(key, [existing, value]);
    } else {
      existing.push(value);
    }
  }

  return Object.fromEntries(result);
}
