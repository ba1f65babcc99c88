import * as fs from 'fs/promises';
import type { ShellgateEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { formatPrefix } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends events to an audit file, one JSON object per line.
 * Plain messages go to stderr.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: ShellgateEvent): Promise<void> {
    const redactedEvent = redactForLogs(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // An unwritable audit log must not turn into a verdict.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: ShellgateEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.error(this.withPrefix(message));
  }

  info(message: string): void {
    console.error(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    return formatPrefix(this.bindings, message);
  }
}
