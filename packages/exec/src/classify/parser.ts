import type { ChainOperator, CommandInvocation, CommandSegment, ParsedCommand } from './types';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

interface RawSegment {
  raw: string;
  operator: ChainOperator | null;
}

// Operators after which an empty tail is still a complete command (`ls;`, `npm run dev &`).
const TERMINATORS: ReadonlySet<ChainOperator> = new Set<ChainOperator>([';', '&', '\n']);

const DOUBLE_QUOTE_ESCAPABLE = new Set(['$', '`', '"', '\\', '\n']);

/**
 * Splits a command line into words the way a POSIX shell would for simple
 * commands: whitespace separates words, quotes group them, a backslash escapes
 * the next character. Inside double quotes it only escapes `$`, `` ` ``, `"`,
 * `\` and newline; before anything else it stays literal. Inside single quotes
 * it is always literal.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escape: 'bare' | 'double' | null = null;
  const trimmed = input.trim();

  for (const char of trimmed) {
    if (escape) {
      if (escape === 'double' && !DOUBLE_QUOTE_ESCAPABLE.has(char)) {
        current += '\\' + char;
      } else if (char !== '\n') {
        // Backslash-newline is a line continuation.
        current += char;
      }
      escape = null;
    } else if (quote === "'") {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === '\\') {
      escape = quote === '"' ? 'double' : 'bare';
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

export function parseCommand(input: string): ParsedCommand {
  const tokens = tokenize(input);

  // Identify env vars at the beginning
  // Env var pattern: key=value, key must be valid identifier
  let cmdIndex = 0;
  while (cmdIndex < tokens.length && /^[a-zA-Z_][a-zA-Z0-9_]*=/.test(tokens[cmdIndex])) {
    cmdIndex++;
  }
  const env = tokens.slice(0, cmdIndex);

  if (cmdIndex >= tokens.length) {
    // e.g. "A=1": no program at all
    return { bin: '', args: [], env, raw: input };
  }

  return {
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}

/**
 * Splits a command line at unquoted chaining operators (`;`, `&&`, `||`, `|`, `&`, newline).
 */
export function splitSegments(input: string): ParseResult<RawSegment[]> {
  const parts: RawSegment[] = [];
  let start = 0;
  let operator: ChainOperator | null = null;
  let quote: "'" | '"' | null = null;
  let escape = false;

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (quote === "'") {
      if (char === quote) quote = null;
      continue;
    }
    if (char === '\\') {
      escape = true;
      continue;
    }
    if (quote) {
      if (char === quote) quote = null;
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      continue;
    }

    const next = input[i + 1];
    let op: ChainOperator | null = null;
    if (char === '&') {
      op = next === '&' ? '&&' : '&';
    } else if (char === '|') {
      op = next === '|' ? '||' : '|';
    } else if (char === ';') {
      op = ';';
    } else if (char === '\n') {
      op = '\n';
    }

    if (op) {
      parts.push({ raw: input.slice(start, i).trim(), operator });
      operator = op;
      start = i + op.length;
      i += op.length - 1;
    }
  }

  if (quote) {
    return { ok: false, error: 'unterminated quote' };
  }
  if (escape) {
    return { ok: false, error: 'trailing backslash' };
  }

  parts.push({ raw: input.slice(start).trim(), operator });

  const last = parts[parts.length - 1];
  if (parts.length > 1 && last.raw === '' && last.operator && TERMINATORS.has(last.operator)) {
    parts.pop();
  }

  if (parts.some((part) => part.raw === '')) {
    return { ok: false, error: 'empty command segment' };
  }

  return { ok: true, value: parts };
}

/**
 * Parses a full command line into its chained segments.
 */
export function parseInvocation(input: string): ParseResult<CommandInvocation> {
  const split = splitSegments(input);
  if (!split.ok) {
    return split;
  }

  const segments: CommandSegment[] = split.value.map(({ raw, operator }) => ({
    ...parseCommand(raw),
    operator,
  }));

  return { ok: true, value: { raw: input, segments } };
}
