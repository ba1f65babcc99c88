import path from 'node:path';
import {
  PolicyConfigurationError,
  PolicyDefinitionSchema,
  type DeniedPatternDefinition,
  type PolicyDefinition,
  type PolicyDefinitionInput,
} from '@shellgate/shared';
import { compileDeniedPattern } from '../classify/patterns';
import type { Policy } from '../classify/types';

/**
 * Configuration-level adjustments applied on top of a preset.
 * Built-in denied patterns can only be added to, never removed.
 */
export interface PolicyOverrides {
  allow?: string[];
  deny?: string[];
  deniedPatterns?: DeniedPatternDefinition[];
  maxCommandLength?: number;
}

/**
 * Freezes `value` and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * A set view with no mutators; the backing set is only reachable through this closure.
 */
function readonlySet<T>(values: Iterable<T>): ReadonlySet<T> {
  const items = new Set(values);
  const view: ReadonlySet<T> = {
    get size() {
      return items.size;
    },
    has: (value) => items.has(value),
    forEach(callback, thisArg?: unknown) {
      items.forEach((value) => callback.call(thisArg, value, value, view));
    },
    entries: () => items.entries(),
    keys: () => items.keys(),
    values: () => items.values(),
    [Symbol.iterator]: () => items[Symbol.iterator](),
  };
  return Object.freeze(view);
}

/**
 * Validates a policy definition and binds it to a project root.
 *
 * @throws PolicyConfigurationError when the definition is invalid or the root is not absolute.
 */
export function createPolicy(definition: PolicyDefinitionInput, projectRoot: string): Policy {
  const result = PolicyDefinitionSchema.safeParse(definition);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new PolicyConfigurationError(`Policy definition is invalid:\n${issues}`);
  }
  const parsed = result.data;

  if (typeof projectRoot !== 'string' || !path.posix.isAbsolute(projectRoot)) {
    throw new PolicyConfigurationError(
      `projectRoot must be an absolute path, got "${String(projectRoot)}"`,
    );
  }

  const seen = new Set<string>();
  for (const { id } of parsed.deniedPatterns) {
    if (seen.has(id)) {
      throw new PolicyConfigurationError(`Denied pattern id "${id}" is defined more than once`);
    }
    seen.add(id);
  }

  const deniedPatterns = Object.freeze(parsed.deniedPatterns.map(compileDeniedPattern));

  return Object.freeze({
    name: parsed.name,
    description: parsed.description,
    allowedPrograms: readonlySet(parsed.allowedPrograms),
    deniedPatterns,
    projectRoot: path.posix.resolve(projectRoot),
    maxCommandLength: parsed.maxCommandLength,
    trustedBinDirs: Object.freeze([...parsed.trustedBinDirs]),
    argumentRules: deepFreeze(parsed.argumentRules),
  });
}

/**
 * Applies configuration overrides to a preset definition.
 */
export function extendPolicyDefinition(
  base: PolicyDefinition,
  overrides: PolicyOverrides = {},
): PolicyDefinition {
  const removed = new Set(overrides.deny ?? []);
  const allowedPrograms = [...new Set([...base.allowedPrograms, ...(overrides.allow ?? [])])]
    .filter((program) => !removed.has(program))
    .sort();

  return {
    ...base,
    allowedPrograms,
    deniedPatterns: [...base.deniedPatterns, ...(overrides.deniedPatterns ?? [])],
    maxCommandLength: overrides.maxCommandLength ?? base.maxCommandLength,
  };
}

/**
 * Renders a policy as a flat listing, one fact per line, for audit and review.
 * Denied patterns keep policy order since evaluation order decides the reported reason.
 */
export function describePolicy(policy: Policy): string {
  const lines = [
    `policy: ${policy.name}`,
    `project-root: ${policy.projectRoot}`,
    `max-command-length: ${policy.maxCommandLength}`,
  ];

  for (const program of [...policy.allowedPrograms].sort()) {
    lines.push(`allow: ${program}`);
  }
  for (const dir of [...policy.trustedBinDirs].sort()) {
    lines.push(`trusted-bin-dir: ${dir}`);
  }
  for (const { id, pattern, description } of policy.deniedPatterns) {
    lines.push(`deny-pattern: ${id} ${pattern.toString()} (${description})`);
  }
  for (const program of Object.keys(policy.argumentRules).sort()) {
    const rule = policy.argumentRules[program];
    const extra = rule.kind === 'process-names' ? ` ${rule.allowed.join(',')}` : '';
    lines.push(`argument-rule: ${program} ${rule.kind}${extra}`);
  }

  return lines.join('\n');
}
