import type { ShellgateEvent } from '../types/events';
import type { Logger, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Drops plain messages below the configured level. Structured events are
 * forwarded unless `forwardEvents` is off (console output without an audit file).
 */
export class LeveledLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly level: LogLevel = 'info',
    private readonly forwardEvents = true,
  ) {}

  log(event: ShellgateEvent) {
    if (this.forwardEvents) return this.base.log(event);
  }

  trace(event: ShellgateEvent, message: string) {
    if (this.forwardEvents) return this.base.trace(event, message);
  }

  debug(message: string) {
    if (this.enabled('debug')) return this.base.debug(message);
  }

  info(message: string) {
    if (this.enabled('info')) return this.base.info(message);
  }

  warn(message: string) {
    if (this.enabled('warn')) return this.base.warn(message);
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new LeveledLogger(this.base.child(bindings), this.level, this.forwardEvents);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
