export const name = '@shellgate/shared';

export * from './types/events';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/path';
export * from './config/schema';
