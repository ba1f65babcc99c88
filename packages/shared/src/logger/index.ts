import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { LeveledLogger } from './leveledLogger';
export type { Logger, LogLevel, MaybePromise } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, LeveledLogger };
