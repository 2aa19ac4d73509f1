/**
 * Database permission reconciliation
 */

export type {
  BindingTarget,
  GrantOptions,
  RevokeOptions,
  DatabaseAction,
  DatabasePlan,
  DatabaseStatus,
  DatabaseOutcome,
  PermissionSummary,
} from './types.js';

export {
  compileDatabaseFilter,
  filterDatabases,
  hasBinding,
  planGrant,
  planRevoke,
} from './diff.js';

export { grantDatabasePermissions, revokeDatabasePermissions } from './apply.js';
export type { ApplyPermissionOptions } from './apply.js';
