import path from 'node:path';
import { isWithinRoot, resolvePosix } from '@shellgate/shared';
import type { ParsedCommand, Policy } from './types';

const URL_PREFIX = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;
const FILE_URL_PREFIX = /^file:\/\//i;
const GLOB_CHARS = /[*?[]/;

export function isPathLike(token: string): boolean {
  return token.startsWith('/') || token.startsWith('~') || token.includes('/') || token.includes('..');
}

/**
 * Expands an argument into the strings a program may treat as paths:
 * the argument itself, the value of `key=value` / `--flag=value`, and every
 * value a short-option cluster could carry (`-t/tmp`, `-C/`, `-ab../x`).
 */
function pathCandidates(token: string): string[] {
  const candidates = [token];
  const eq = token.indexOf('=');
  if (eq !== -1) {
    candidates.push(token.slice(eq + 1));
  }
  if (/^-[A-Za-z]/.test(token)) {
    for (let i = 2; i < token.length && /[A-Za-z]/.test(token[i - 1]); i++) {
      candidates.push(token.slice(i));
    }
  }
  return candidates;
}

/**
 * True when a glob component such as `.?` or `.*` can expand to `..`.
 * A leading dot is only matched literally, so other globs never reach the parent.
 */
function globMatchesParent(component: string): boolean {
  if (!component.startsWith('.') || !GLOB_CHARS.test(component)) {
    return false;
  }
  const source = component
    .replace(/\[[^\]]*\]?/g, '\u0000')
    .replace(/[.+^${}()|\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.')
    .replace(/\u0000/g, '.');
  return new RegExp(`^${source}$`).test('..');
}

function escapesRoot(candidate: string, projectRoot: string): boolean {
  let target = candidate;
  if (URL_PREFIX.test(target)) {
    if (!FILE_URL_PREFIX.test(target)) return false;
    target = target.replace(FILE_URL_PREFIX, '');
  }
  if (target.split('/').some(globMatchesParent)) return true;
  if (!isPathLike(target)) return false;
  // Home-relative paths expand outside any project root the shell cannot see.
  if (target.startsWith('~')) return true;
  return !isWithinRoot(projectRoot, resolvePosix(projectRoot, target));
}

function isUntrustedProgramPath(bin: string, policy: Policy): boolean {
  return bin.includes('/') && !policy.trustedBinDirs.includes(path.posix.dirname(bin));
}

/**
 * True for a program token that names a file inside the project root
 * (`./git`, `scripts/build`) rather than one found in a trusted bin directory.
 */
export function isProjectLocalProgram(bin: string, policy: Policy): boolean {
  return isUntrustedProgramPath(bin, policy) && !escapesRoot(bin, policy.projectRoot);
}

/**
 * Returns the first token of the segment that resolves outside the project root.
 */
export function findPathOutsideRoot(command: ParsedCommand, policy: Policy): string | undefined {
  const tokens: string[] = [];

  if (isUntrustedProgramPath(command.bin, policy)) {
    tokens.push(command.bin);
  }
  tokens.push(...command.args);

  for (const token of tokens) {
    if (pathCandidates(token).some((candidate) => escapesRoot(candidate, policy.projectRoot))) {
      return token;
    }
  }

  for (const assignment of command.env) {
    const value = assignment.slice(assignment.indexOf('=') + 1);
    if (escapesRoot(value, policy.projectRoot)) {
      return assignment;
    }
  }

  return undefined;
}
