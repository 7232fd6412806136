export { TitlecastLogger, createRootLogger, silentLogger, type LoggerOptions } from './logger.js';
export { LOG_LEVELS, isLogLevel, type LogLevel, type LogContext, type Logger } from './types.js';
