export { logger, setLoggerOptions, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export { DiaryError, InvalidArgumentError, AuthorNotFoundError } from './errors.js';
export { isBlank, parseArgument, requireValue } from './validate.js';
