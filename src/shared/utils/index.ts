export { logger, Logger, LogLevel, describeError } from './logger';
export type { LogMeta } from './logger';
export { generateId, isGeneratedId } from './uuid';
