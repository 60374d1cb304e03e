export { createLogger, resolveLogLevel, setLogLevel, logger } from './logger';
export type { Logger, LogLevel } from './logger';
