/**
 * Cluster administration API module
 *
 * Provides:
 * - ClusterClient with acls, roles, users, databases sub-clients
 * - Bounded retry and polling helpers
 * - Structured logging with secret redaction
 * - Type definitions for API resources
 */

// Main client
export { createClient } from './client.js';

export type {
  ClusterClient,
  ClusterClientFactory,
  AclsClient,
  RolesClient,
  UsersClient,
  DatabasesClient,
} from './client.js';

// Errors
export {
  RequestError,
  ConflictError,
  CONFLICT_STATUS,
  isConflictError,
  isRequestError,
  errorMessage,
} from './errors.js';

export { DecodeError } from './decode.js';

// Retry utilities
export {
  withRetry,
  pollUntil,
  calculateDelay,
  resolvePolicy,
  sleep,
  DEFAULT_CONFLICT_RETRY,
  DEFAULT_DELETION_POLL,
} from './retry.js';

export type { RetryOptions, PollOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  redactPatterns,
  redactValue,
  redactContext,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig, LogSink } from './logger.js';

// Types
export type * from './types.js';
export { ROLE_MANAGEMENT_LEVELS } from './types.js';
