/**
 * Types for per-database permission reconciliation
 */

import type { PermissionBinding } from '../../api/types.js';

/**
 * The (role, ACL) pair being granted or revoked
 */
export interface BindingTarget {
  roleUid: number;
  aclUid: number;
}

export interface GrantOptions extends BindingTarget {
  /** Regex searched (not anchored) in each database name */
  filter?: string;
  /** Report already-bound databases as skipped instead of succeeded */
  skipExisting?: boolean;
}

export interface RevokeOptions extends BindingTarget {
  filter?: string;
}

/**
 * What happens to one database
 * - grant: the pair is appended
 * - already-granted: pair present, counted as success
 * - skip: pair present, left out of the tally (skipExisting)
 * - revoke: matching entries removed
 * - unchanged: nothing to remove
 */
export type DatabaseAction = 'grant' | 'already-granted' | 'skip' | 'revoke' | 'unchanged';

/**
 * Planned change for one database
 */
export interface DatabasePlan {
  uid: number;
  name: string;
  action: DatabaseAction;
  /** Full permission list to send; present for grant and revoke */
  bindings?: PermissionBinding[];
}

export type DatabaseStatus = 'succeeded' | 'failed' | 'skipped';

/**
 * Per-database result
 */
export interface DatabaseOutcome {
  uid: number;
  name: string;
  action: DatabaseAction;
  status: DatabaseStatus;
  error?: string;
}

/**
 * Tally of a grant or revoke run.
 *
 * `total` counts databases that took part in the tally (matched minus
 * skipped), so `succeeded/total` is the figure reported to the operator.
 */
export interface PermissionSummary {
  /** Databases returned by the API */
  available: number;
  /** Databases that passed the filter */
  matched: number;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  databases: DatabaseOutcome[];
}
