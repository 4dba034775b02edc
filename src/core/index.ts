/**
 * Core module exports
 */
export { logger, setLogLevel, createChildLogger, createLogger, isLogLevel, symbols, type LogLevel } from './Logger.js';
export { Application, createApplication, type ApplicationOptions } from './Application.js';
