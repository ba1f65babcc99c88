import path from 'path';
import {
  ConsoleLogger,
  JsonlLogger,
  LeveledLogger,
  type LoggingConfig,
  type Logger,
} from '@shellgate/shared';

/**
 * Builds the logger described by the `logging` config section.
 * With `auditLog` set, events go to that JSONL file (relative paths resolve against `cwd`);
 * without it, events reach the console only at debug level.
 */
export function createLogger(config: LoggingConfig, cwd: string = process.cwd()): Logger {
  const base = config.auditLog
    ? new JsonlLogger(path.resolve(cwd, config.auditLog))
    : new ConsoleLogger();
  return new LeveledLogger(base, config.level, config.auditLog !== undefined || config.level === 'debug');
}
