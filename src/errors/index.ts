/**
 * Error handling module for the course-rag CLI
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: crag config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ToolConfigurationError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  LLMRequestError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
