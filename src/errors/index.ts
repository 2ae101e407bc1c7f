/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: tender-insight config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  StoreUnavailableError,
  EmptyDocumentError,
  UnsupportedFormatError,
  TransientProviderError,
  PermanentProviderError,
  FieldExtractionFailure,
  AgentTotalFailure,
  WorkflowTimeoutError,
  isFatalPipelineError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  errorMessage,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
