import type { ShellgateEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Writes to the console. Every stream goes to stderr so that stdout stays
 * free for hook responses and `--json` output.
 */
export class ConsoleLogger implements Logger {
  log(event: ShellgateEvent): void {
    console.error(JSON.stringify(event));
  }

  trace(event: ShellgateEvent, message: string): void {
    console.error(message, JSON.stringify(event));
  }

  debug(message: string): void {
    console.error(message);
  }

  info(message: string): void {
    console.error(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

export class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: ShellgateEvent) {
    return this.base.log(event);
  }

  trace(event: ShellgateEvent, message: string) {
    return this.base.trace(event, this.withPrefix(message));
  }

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    return formatPrefix(this.bindings, message);
  }
}

export function formatPrefix(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
