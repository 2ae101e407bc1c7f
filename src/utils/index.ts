/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export {
  formatTable,
  displayWidth,
  truncate,
  stripAnsi,
  type Column,
  type Alignment,
  type Row,
} from './table.js';

// Cancellation and scheduling
export {
  OperationCancelledError,
  checkCancelled,
  sleep,
  raceAbort,
  yieldToEventLoop,
} from './async.js';

// Concurrency primitives
export { Semaphore, ReadWriteLock, mapWithConcurrency } from './concurrency.js';

// Logging
export { consoleLogger, silentLogger, scopedLogger, type Logger } from './logger.js';
