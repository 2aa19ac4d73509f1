/**
 * Type definitions for the cluster administration REST API
 *
 * Field names follow the wire format (snake_case) so that responses can be
 * passed through without mapping.
 */

// =============================================================================
// Resources
// =============================================================================

/**
 * Role management level accepted by the roles endpoint
 */
export type RoleManagement = 'admin' | 'cluster_member' | 'db_member' | 'none';

export const ROLE_MANAGEMENT_LEVELS: readonly RoleManagement[] = [
  'admin',
  'cluster_member',
  'db_member',
  'none',
];

/**
 * Named ACL rule set (`/v1/redis_acls`)
 */
export interface Acl {
  uid: number;
  name: string;
  /** Rule string, e.g. "+@read +info +ping" */
  acl?: string;
}

/**
 * Role (`/v1/roles`)
 */
export interface Role {
  uid: number;
  name: string;
  /** Any level the cluster reports, including ones this tool never sends */
  management?: string;
}

/**
 * User (`/v1/users`). The password is write-only and never returned.
 */
export interface User {
  uid: number;
  name: string;
  email?: string;
  role_uids?: number[];
}

/**
 * A (role, ACL) pair attached to one database
 */
export interface PermissionBinding {
  role_uid: number;
  redis_acl_uid: number;
}

/**
 * Database (`/v1/bdbs`). Only the fields this tool reads are typed.
 */
export interface Database {
  uid: number;
  name: string;
  roles_permissions?: PermissionBinding[];
}

// =============================================================================
// Requests
// =============================================================================

export interface CreateAclRequest {
  name: string;
  acl: string;
}

export interface CreateRoleRequest {
  name: string;
  management: RoleManagement;
}

export interface CreateUserRequest {
  name: string;
  email: string;
  password: string;
  role_uids: number[];
}

/**
 * Outcome of a database permission update.
 *
 * This call reports failure as a value instead of throwing so that one
 * database cannot abort a batch.
 */
export type PermissionUpdateResult =
  | { ok: true }
  | { ok: false; status?: number; detail: string };

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * HTTP methods used against the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Configuration for a single-cluster client
 */
export interface ClusterClientConfig {
  /** REST API endpoint, e.g. https://cluster.example.com:9443 */
  endpoint: string;
  /** Admin username for basic auth */
  username: string;
  /** Admin password for basic auth */
  password: string;
  /** Verify the server certificate (default: false) */
  verifySsl?: boolean;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Enable debug logging of requests */
  debug?: boolean;
}

// =============================================================================
// Retry Types
// =============================================================================

/**
 * Delay growth between attempts
 */
export type BackoffStrategy = 'fixed' | 'exponential';

/**
 * Bounded retry policy. Injected wherever the reconciler waits.
 */
export interface RetryPolicy {
  /** Total number of attempts, including the first */
  maxAttempts: number;
  /** Delay before the second attempt, in milliseconds */
  delayMs: number;
  /** Growth of the delay between later attempts (default: fixed) */
  backoff?: BackoffStrategy;
}

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** Whether the operation succeeded */
  success: boolean;
  /** The result data (if successful) */
  data?: T;
  /** The last error (if failed) */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
}

/**
 * Sleep function. Tests replace it with one that resolves immediately.
 */
export type Sleeper = (ms: number) => Promise<void>;
