/**
 * Permission diff
 *
 * Pure planning: given the databases as listed by the API, decide which
 * ones need the (role, ACL) pair appended or removed. Nothing here talks
 * to the cluster.
 */

import type { Database, PermissionBinding } from '../../api/types.js';
import { InvalidFilterPatternError } from '../agents/types.js';
import type { BindingTarget, DatabasePlan } from './types.js';

/**
 * Compile a database name filter.
 *
 * Matching is a search, so `prod-` matches `eu-prod-1`. Anchor the pattern
 * for a prefix match.
 *
 * @throws InvalidFilterPatternError when the pattern does not compile
 */
export function compileDatabaseFilter(pattern: string | undefined): RegExp | undefined {
  if (pattern === undefined || pattern === '') {
    return undefined;
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new InvalidFilterPatternError(
      pattern,
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * Databases whose names the filter matches (all of them without a filter)
 */
export function filterDatabases(databases: Database[], filter: RegExp | undefined): Database[] {
  if (!filter) return databases;
  return databases.filter((db) => filter.test(db.name));
}

/**
 * True when both uids appear together in one entry
 */
export function hasBinding(db: Database, target: BindingTarget): boolean {
  return (db.roles_permissions ?? []).some(
    (binding) => binding.role_uid === target.roleUid && binding.redis_acl_uid === target.aclUid
  );
}

/**
 * Plan the grant of `target` on each database.
 *
 * Databases that already carry the pair are never written; `skipExisting`
 * only decides whether they count toward the tally.
 */
export function planGrant(
  databases: Database[],
  target: BindingTarget,
  skipExisting = false
): DatabasePlan[] {
  return databases.map((db): DatabasePlan => {
    if (hasBinding(db, target)) {
      return { uid: db.uid, name: db.name, action: skipExisting ? 'skip' : 'already-granted' };
    }
    const bindings: PermissionBinding[] = [
      ...(db.roles_permissions ?? []),
      { role_uid: target.roleUid, redis_acl_uid: target.aclUid },
    ];
    return { uid: db.uid, name: db.name, action: 'grant', bindings };
  });
}

/**
 * Plan the removal of `target` from each database.
 *
 * Only entries matching both uids are removed; every other entry, including
 * ones that share a single uid with the target, is kept in order.
 */
export function planRevoke(databases: Database[], target: BindingTarget): DatabasePlan[] {
  return databases.map((db): DatabasePlan => {
    const current = db.roles_permissions ?? [];
    const kept = current.filter(
      (binding) =>
        !(binding.role_uid === target.roleUid && binding.redis_acl_uid === target.aclUid)
    );
    if (kept.length === current.length) {
      return { uid: db.uid, name: db.name, action: 'unchanged' };
    }
    return { uid: db.uid, name: db.name, action: 'revoke', bindings: kept };
  });
}
