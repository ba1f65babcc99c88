import type { ArgumentRule } from '@shellgate/shared';
import type { ParsedCommand } from './types';

const EXECUTABLE_MODE = /^[ugoa]*\+x$/;

/**
 * Checks a segment's arguments against the rule registered for its program.
 * Returns the denial message, or `null` when the arguments are acceptable.
 */
export function checkArguments(
  program: string,
  command: ParsedCommand,
  rule: ArgumentRule,
): string | null {
  switch (rule.kind) {
    case 'chmod-executable':
      return checkExecutableMode(program, command.args);
    case 'process-names':
      return checkProcessNames(program, command.args, rule.allowed);
    case 'local-script':
      return command.bin === `./${program}` ? null : `${program} must be invoked as ./${program}`;
  }
}

function checkExecutableMode(program: string, args: string[]): string | null {
  const message = `${program} only allows making files executable (+x)`;
  const [mode, ...files] = args;
  if (mode === undefined || !EXECUTABLE_MODE.test(mode) || files.length === 0) {
    return message;
  }
  if (files.some((file) => file.startsWith('-'))) {
    return message;
  }
  return null;
}

function checkProcessNames(program: string, args: string[], allowed: string[]): string | null {
  const message = `${program} only allows killing: ${allowed.join(', ')}`;
  const targets: string[] = [];

  for (const arg of args) {
    if (arg === '-f') continue;
    if (arg.startsWith('-')) return message;
    targets.push(arg);
  }

  if (targets.length === 0) {
    return message;
  }

  // With -f the pattern is matched against the full command line; its first word names the process.
  const ok = targets.every((target) => {
    const name = target.trim().split(/\s+/)[0];
    return allowed.includes(name);
  });
  return ok ? null : message;
}
