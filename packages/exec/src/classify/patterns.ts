import { PolicyConfigurationError, type DeniedPatternDefinition } from '@shellgate/shared';
import type { DeniedPattern } from './types';

/**
 * Compiles a denied-pattern definition. Stateful flags (`g`, `y`) are rejected
 * by the schema, so `test` gives the same answer on every call.
 */
export function compileDeniedPattern(definition: DeniedPatternDefinition): DeniedPattern {
  let pattern: RegExp;
  try {
    pattern = new RegExp(definition.pattern, definition.flags ?? '');
  } catch (error) {
    throw new PolicyConfigurationError(
      `Denied pattern "${definition.id}" is not a valid regular expression`,
      { cause: error, details: { pattern: definition.pattern } },
    );
  }
  return Object.freeze({
    id: definition.id,
    description: definition.description,
    pattern,
  });
}

/**
 * Returns the first denied pattern (in policy order) that matches `text`.
 */
export function findDeniedPattern(
  text: string,
  patterns: readonly DeniedPattern[],
): DeniedPattern | undefined {
  return patterns.find(({ pattern }) => pattern.test(text));
}
