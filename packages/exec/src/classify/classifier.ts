import { basename } from '@shellgate/shared';
import { checkArguments } from './arguments';
import { parseInvocation } from './parser';
import { findPathOutsideRoot, isProjectLocalProgram } from './paths';
import { findDeniedPattern } from './patterns';
import type { DenyRule, DenyVerdict, Policy, Verdict } from './types';

export const ALLOW: Verdict = Object.freeze({ kind: 'allow' });

export const PATH_OUTSIDE_ROOT = 'path outside project root';

function deny(rule: DenyRule, reason: string, detail?: string): DenyVerdict {
  return detail === undefined ? { kind: 'deny', rule, reason } : { kind: 'deny', rule, reason, detail };
}

/**
 * Decides whether `command` may run under `policy`.
 *
 * Checks run in a fixed order and the first failure wins:
 * whole-string pattern scan, segmentation (with a per-segment pattern scan),
 * program allowlist and argument rules, then path scope.
 * Never throws; anything unexpected is a `malformed` denial.
 */
export function classify(command: unknown, policy: Policy): Verdict {
  try {
    return evaluate(command, policy);
  } catch (error) {
    return deny('malformed', 'malformed', error instanceof Error ? error.message : String(error));
  }
}

function evaluate(command: unknown, policy: Policy): Verdict {
  if (typeof command !== 'string') {
    return deny('malformed', 'malformed', `expected a string, got ${describeType(command)}`);
  }
  if (command.length > policy.maxCommandLength) {
    return deny('malformed', 'malformed', `command exceeds ${policy.maxCommandLength} characters`);
  }
  if (command.trim() === '') {
    return deny('empty', 'empty command');
  }

  // 1. Raw string first: substitution and redirection can hide a program from segmentation.
  const rawHit = findDeniedPattern(command, policy.deniedPatterns);
  if (rawHit) {
    return deny('pattern', rawHit.description, rawHit.id);
  }

  // 2. Segmentation
  const parsed = parseInvocation(command);
  if (!parsed.ok) {
    return deny('malformed', 'malformed', parsed.error);
  }
  const { segments } = parsed.value;

  for (const segment of segments) {
    const hit = findDeniedPattern(segment.raw, policy.deniedPatterns);
    if (hit) {
      return deny('chaining', hit.description, segment.raw);
    }
  }

  // 3. Programs
  for (const segment of segments) {
    const program = basename(segment.bin);
    if (!segment.bin || !policy.allowedPrograms.has(program)) {
      return deny('allowlist', `program '${program}' not in allowlist`, segment.raw);
    }
    const rule = Object.prototype.hasOwnProperty.call(policy.argumentRules, program)
      ? policy.argumentRules[program]
      : undefined;
    // Programs inside the project run only as declared local scripts.
    if (rule?.kind !== 'local-script' && isProjectLocalProgram(segment.bin, policy)) {
      return deny('allowlist', `program '${segment.bin}' not in allowlist`, segment.raw);
    }
    if (rule) {
      const failure = checkArguments(program, segment, rule);
      if (failure) {
        return deny('arguments', failure, segment.raw);
      }
    }
  }

  // 4. Paths
  for (const segment of segments) {
    const outside = findPathOutsideRoot(segment, policy);
    if (outside !== undefined) {
      return deny('path-scope', PATH_OUTSIDE_ROOT, outside);
    }
  }

  return ALLOW;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isAllowed(verdict: Verdict): boolean {
  return verdict.kind === 'allow';
}

/**
 * One-line rendering used in logs and hook responses.
 */
export function formatVerdict(verdict: Verdict): string {
  if (verdict.kind === 'allow') {
    return 'ALLOW';
  }
  return `DENY [${verdict.rule}] ${verdict.reason}${verdict.detail ? ` (${verdict.detail})` : ''}`;
}
