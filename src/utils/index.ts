/**
 * Utilities Module
 */

export { type Logger, consoleLogger, silentLogger } from './logger.js';
