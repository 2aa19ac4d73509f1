/**
 * Unit Tests: Permission Diff
 *
 * Tests pure planning of database bindings:
 * - Filter compilation and search semantics
 * - Grant plans append the pair and keep existing entries
 * - Revoke plans remove only the exact (role, ACL) pair
 */

import { describe, it, expect } from 'vitest';
import type { Database } from '../../src/api/types.js';
import { InvalidFilterPatternError } from '../../src/reconcilers/agents/types.js';
import {
  compileDatabaseFilter,
  filterDatabases,
  hasBinding,
  planGrant,
  planRevoke,
} from '../../src/reconcilers/permissions/index.js';

const target = { roleUid: 7, aclUid: 3 };

function db(uid: number, name: string, bindings?: Array<[number, number]>): Database {
  return {
    uid,
    name,
    roles_permissions: bindings?.map(([role_uid, redis_acl_uid]) => ({ role_uid, redis_acl_uid })),
  };
}

// =============================================================================
// Filters
// =============================================================================

describe('compileDatabaseFilter', () => {
  it('returns undefined for a missing or empty pattern', () => {
    expect(compileDatabaseFilter(undefined)).toBeUndefined();
    expect(compileDatabaseFilter('')).toBeUndefined();
  });

  it('rejects a pattern that does not compile', () => {
    expect(() => compileDatabaseFilter('(')).toThrow(InvalidFilterPatternError);
  });

  it('names the pattern in the error', () => {
    try {
      compileDatabaseFilter('[a-');
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidFilterPatternError);
      if (error instanceof InvalidFilterPatternError) {
        expect(error.code).toBe('INVALID_FILTER_PATTERN');
        expect(error.message.startsWith("Invalid regex pattern '[a-': ")).toBe(true);
      }
    }
  });
});

describe('filterDatabases', () => {
  const databases = [db(1, 'prod-a'), db(2, 'eu-prod-1'), db(3, 'staging-a')];

  it('keeps everything without a filter', () => {
    expect(filterDatabases(databases, undefined)).toEqual(databases);
  });

  it('matches anywhere in the name', () => {
    const names = filterDatabases(databases, compileDatabaseFilter('prod-')).map((d) => d.name);
    expect(names).toEqual(['prod-a', 'eu-prod-1']);
  });

  it('honours anchors', () => {
    const names = filterDatabases(databases, compileDatabaseFilter('^prod-')).map((d) => d.name);
    expect(names).toEqual(['prod-a']);
  });
});

// =============================================================================
// Grant
// =============================================================================

describe('planGrant', () => {
  it('appends the pair after the existing entries', () => {
    const [plan] = planGrant([db(1, 'prod-a', [[1, 1]])], target);

    expect(plan).toEqual({
      uid: 1,
      name: 'prod-a',
      action: 'grant',
      bindings: [
        { role_uid: 1, redis_acl_uid: 1 },
        { role_uid: 7, redis_acl_uid: 3 },
      ],
    });
  });

  it('treats a database without a permission list as empty', () => {
    const [plan] = planGrant([db(2, 'prod-b')], target);
    expect(plan.bindings).toEqual([{ role_uid: 7, redis_acl_uid: 3 }]);
  });

  it('never rewrites a database that already has the pair', () => {
    const bound = db(1, 'prod-a', [[7, 3]]);

    expect(planGrant([bound], target)).toEqual([
      { uid: 1, name: 'prod-a', action: 'already-granted' },
    ]);
    expect(planGrant([bound], target, true)).toEqual([{ uid: 1, name: 'prod-a', action: 'skip' }]);
  });

  it('does not count a half match as bound', () => {
    const halves = db(1, 'prod-a', [
      [7, 4],
      [8, 3],
    ]);
    expect(hasBinding(halves, target)).toBe(false);
    expect(planGrant([halves], target)[0].action).toBe('grant');
  });
});

// =============================================================================
// Revoke
// =============================================================================

describe('planRevoke', () => {
  it('removes only the exact pair', () => {
    const [plan] = planRevoke(
      [
        db(1, 'prod-a', [
          [7, 3],
          [7, 4],
          [8, 3],
        ]),
      ],
      target
    );

    expect(plan).toEqual({
      uid: 1,
      name: 'prod-a',
      action: 'revoke',
      bindings: [
        { role_uid: 7, redis_acl_uid: 4 },
        { role_uid: 8, redis_acl_uid: 3 },
      ],
    });
  });

  it('leaves databases without the pair unchanged', () => {
    expect(planRevoke([db(1, 'prod-a', [[7, 4]]), db(2, 'prod-b')], target)).toEqual([
      { uid: 1, name: 'prod-a', action: 'unchanged' },
      { uid: 2, name: 'prod-b', action: 'unchanged' },
    ]);
  });
});
