import type { ArgumentRule } from '@shellgate/shared';

/** Operators that separate one program invocation from the next. */
export type ChainOperator = ';' | '&&' | '||' | '|' | '&' | '\n';

export interface ParsedCommand {
  /** Program token as written, before path qualification is stripped */
  bin: string;
  args: string[];
  /** Leading `NAME=value` assignments */
  env: string[];
  raw: string;
}

export interface CommandSegment extends ParsedCommand {
  /** Operator preceding this segment; `null` for the first one */
  operator: ChainOperator | null;
}

export interface CommandInvocation {
  raw: string;
  segments: CommandSegment[];
}

export interface DeniedPattern {
  readonly id: string;
  readonly description: string;
  readonly pattern: RegExp;
}

/**
 * Immutable classification policy. Built once per session by `createPolicy`.
 */
export interface Policy {
  readonly name: string;
  readonly description?: string;
  readonly allowedPrograms: ReadonlySet<string>;
  readonly deniedPatterns: readonly DeniedPattern[];
  readonly projectRoot: string;
  readonly maxCommandLength: number;
  readonly trustedBinDirs: readonly string[];
  readonly argumentRules: Readonly<Record<string, ArgumentRule>>;
}

export type DenyRule =
  | 'malformed'
  | 'empty'
  | 'pattern'
  | 'chaining'
  | 'allowlist'
  | 'arguments'
  | 'path-scope';

export interface AllowVerdict {
  readonly kind: 'allow';
}

export interface DenyVerdict {
  readonly kind: 'deny';
  readonly rule: DenyRule;
  /** Human-readable reason reported back to the agent */
  readonly reason: string;
  /** The offending token, segment or pattern id, when there is one */
  readonly detail?: string;
}

export type Verdict = AllowVerdict | DenyVerdict;
