/**
 * Unit Tests: Permission Apply
 *
 * Tests grant and revoke against the in-memory cluster:
 * - Tallies (available, matched, total, succeeded, failed, skipped)
 * - Per-database failures do not stop the run
 * - Revoke touches only databases that carry the pair
 */

import { describe, it, expect } from 'vitest';
import { RequestError } from '../../src/api/errors.js';
import { InvalidFilterPatternError } from '../../src/reconcilers/agents/types.js';
import {
  grantDatabasePermissions,
  revokeDatabasePermissions,
} from '../../src/reconcilers/permissions/apply.js';
import { FakeCluster, createMemoryLogger } from '../helpers/fake-cluster.js';

function clusterWith(): FakeCluster {
  return new FakeCluster({
    databases: [
      { uid: 1, name: 'prod-a', roles_permissions: [] },
      { uid: 2, name: 'prod-b' },
      { uid: 3, name: 'staging-a', roles_permissions: [{ role_uid: 1, redis_acl_uid: 1 }] },
    ],
  });
}

// =============================================================================
// Grant
// =============================================================================

describe('grantDatabasePermissions', () => {
  it('binds every database without a filter', async () => {
    const cluster = clusterWith();
    const { logger, lines } = createMemoryLogger('info');

    const summary = await grantDatabasePermissions(cluster, { roleUid: 7, aclUid: 3 }, { logger });

    expect(summary).toMatchObject({
      available: 3,
      matched: 3,
      total: 3,
      succeeded: 3,
      failed: 0,
      skipped: 0,
    });
    expect(cluster.database('staging-a')?.roles_permissions).toEqual([
      { role_uid: 1, redis_acl_uid: 1 },
      { role_uid: 7, redis_acl_uid: 3 },
    ]);
    expect(lines[lines.length - 1]).toBe(
      '[INFO] Successfully updated permissions for 3/3 databases'
    );
  });

  it('only touches databases matching the filter', async () => {
    const cluster = clusterWith();
    const { logger, lines } = createMemoryLogger('info');

    const summary = await grantDatabasePermissions(
      cluster,
      { roleUid: 7, aclUid: 3, filter: 'prod-.*' },
      { logger }
    );

    expect(summary.matched).toBe(2);
    expect(summary.total).toBe(2);
    expect(cluster.calls).toEqual(['databases.update 1', 'databases.update 2']);
    expect(cluster.database('staging-a')?.roles_permissions).toEqual([
      { role_uid: 1, redis_acl_uid: 1 },
    ]);
    expect(lines).toContain("[INFO] Filtered to 2 databases matching pattern 'prod-.*'");
  });

  it('counts an already bound database as succeeded without writing it', async () => {
    const cluster = clusterWith();
    const options = { roleUid: 7, aclUid: 3 };
    await grantDatabasePermissions(cluster, options, { logger: createMemoryLogger('error').logger });
    cluster.calls.length = 0;

    const summary = await grantDatabasePermissions(cluster, options, {
      logger: createMemoryLogger('error').logger,
    });

    expect(cluster.calls).toEqual([]);
    expect(summary).toMatchObject({ total: 3, succeeded: 3, skipped: 0 });
    expect(summary.databases.map((d) => d.action)).toEqual([
      'already-granted',
      'already-granted',
      'already-granted',
    ]);
  });

  it('leaves already bound databases out of the total with skipExisting', async () => {
    const cluster = clusterWith();
    cluster.state.databases[0].roles_permissions = [{ role_uid: 7, redis_acl_uid: 3 }];

    const summary = await grantDatabasePermissions(
      cluster,
      { roleUid: 7, aclUid: 3, skipExisting: true },
      { logger: createMemoryLogger('error').logger }
    );

    expect(summary).toMatchObject({ matched: 3, total: 2, succeeded: 2, skipped: 1 });
    expect(summary.databases[0]).toEqual({
      uid: 1,
      name: 'prod-a',
      action: 'skip',
      status: 'skipped',
    });
  });

  it('records a failed database and carries on', async () => {
    const cluster = clusterWith();
    cluster.failingDatabases.add(2);

    const summary = await grantDatabasePermissions(
      cluster,
      { roleUid: 7, aclUid: 3 },
      { logger: createMemoryLogger('error').logger }
    );

    expect(summary).toMatchObject({ total: 3, succeeded: 2, failed: 1 });
    expect(summary.databases[1]).toEqual({
      uid: 2,
      name: 'prod-b',
      action: 'grant',
      status: 'failed',
      error: 'API Error: Status 500, Response: internal error',
    });
    expect(cluster.calls).toEqual([
      'databases.update 1',
      'databases.update 2',
      'databases.update 3',
    ]);
  });

  it('reports an empty cluster', async () => {
    const cluster = new FakeCluster();
    const { logger, lines } = createMemoryLogger('info');

    const summary = await grantDatabasePermissions(cluster, { roleUid: 7, aclUid: 3 }, { logger });

    expect(summary).toEqual({
      available: 0,
      matched: 0,
      total: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      databases: [],
    });
    expect(lines).toEqual([
      '[INFO] No databases found',
      '[INFO] Successfully updated permissions for 0/0 databases',
    ]);
  });

  it('propagates a failed database listing', async () => {
    const cluster = clusterWith();
    cluster.failingLists.add('database');

    await expect(
      grantDatabasePermissions(cluster, { roleUid: 7, aclUid: 3 }, {
        logger: createMemoryLogger('error').logger,
      })
    ).rejects.toBeInstanceOf(RequestError);
  });

  it('rejects a bad filter before listing', async () => {
    const cluster = clusterWith();
    cluster.failingLists.add('database');

    await expect(
      grantDatabasePermissions(cluster, { roleUid: 7, aclUid: 3, filter: '(' })
    ).rejects.toBeInstanceOf(InvalidFilterPatternError);
  });
  it('converges on a second run without writing again', async () => {
    const cluster = clusterWith();
    const { logger } = createMemoryLogger('error');
    const target = { roleUid: 7, aclUid: 3 };

    await grantDatabasePermissions(cluster, target, { logger });
    const updatesAfterFirst = cluster.calls.length;
    expect(updatesAfterFirst).toBe(3);
    const second = await grantDatabasePermissions(cluster, target, { logger });

    expect(cluster.calls).toHaveLength(updatesAfterFirst);
    expect(second).toMatchObject({ total: 3, succeeded: 3, failed: 0, skipped: 0 });
    expect(second.databases.map((db) => db.action)).toEqual([
      'already-granted',
      'already-granted',
      'already-granted',
    ]);
    for (const db of cluster.state.databases) {
      const pairs = (db.roles_permissions ?? []).filter(
        (b) => b.role_uid === 7 && b.redis_acl_uid === 3
      );
      expect(pairs).toHaveLength(1);
    }
  });
});

// =============================================================================
// Revoke
// =============================================================================

describe('revokeDatabasePermissions', () => {
  it('removes the exact pair and keeps entries sharing one uid', async () => {
    const cluster = new FakeCluster({
      databases: [
        {
          uid: 1,
          name: 'prod-a',
          roles_permissions: [
            { role_uid: 7, redis_acl_uid: 3 },
            { role_uid: 7, redis_acl_uid: 4 },
          ],
        },
        { uid: 2, name: 'prod-b', roles_permissions: [{ role_uid: 9, redis_acl_uid: 3 }] },
      ],
    });
    const { logger, lines } = createMemoryLogger('info');

    const summary = await revokeDatabasePermissions(cluster, { roleUid: 7, aclUid: 3 }, { logger });

    expect(cluster.calls).toEqual(['databases.update 1']);
    expect(cluster.database('prod-a')?.roles_permissions).toEqual([
      { role_uid: 7, redis_acl_uid: 4 },
    ]);
    expect(cluster.database('prod-b')?.roles_permissions).toEqual([
      { role_uid: 9, redis_acl_uid: 3 },
    ]);
    expect(summary).toMatchObject({ total: 2, succeeded: 2 });
    expect(lines[lines.length - 1]).toBe(
      '[INFO] Successfully cleaned up permissions for 2/2 databases'
    );
  });
});
