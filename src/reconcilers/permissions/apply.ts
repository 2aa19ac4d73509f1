/**
 * Permission apply
 *
 * Lists databases, plans with diff.ts, then writes each planned permission
 * list. A database that fails is recorded and the run continues.
 */

import type { ClusterClient } from '../../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type {
  DatabaseOutcome,
  DatabasePlan,
  GrantOptions,
  PermissionSummary,
  RevokeOptions,
} from './types.js';
import { compileDatabaseFilter, filterDatabases, planGrant, planRevoke } from './diff.js';

export interface ApplyPermissionOptions {
  logger?: ApiLogger;
}

/**
 * Write each plan in order and tally the outcomes
 */
async function applyPlans(
  client: ClusterClient,
  plans: DatabasePlan[],
  available: number,
  log: ApiLogger
): Promise<PermissionSummary> {
  const databases: DatabaseOutcome[] = [];

  for (const plan of plans) {
    const base = { uid: plan.uid, name: plan.name, action: plan.action };

    if (plan.action === 'skip') {
      log.info(`Skipping database ${plan.name} (uid ${plan.uid}): binding already present`);
      databases.push({ ...base, status: 'skipped' });
      continue;
    }

    if (!plan.bindings) {
      // already-granted or unchanged: nothing to write
      log.debug(`Database ${plan.name} (uid ${plan.uid}) needs no change`, { action: plan.action });
      databases.push({ ...base, status: 'succeeded' });
      continue;
    }

    const result = await client.databases.updatePermissions(plan.uid, plan.bindings);
    if (result.ok) {
      log.info(
        `${plan.action === 'grant' ? 'Granted' : 'Revoked'} permissions on database ${plan.name} (uid ${plan.uid})`
      );
      databases.push({ ...base, status: 'succeeded' });
    } else {
      log.warn(`Failed to update permissions on database ${plan.name} (uid ${plan.uid})`, {
        status: result.status,
        detail: result.detail,
      });
      databases.push({ ...base, status: 'failed', error: result.detail });
    }
  }

  const succeeded = databases.filter((d) => d.status === 'succeeded').length;
  const failed = databases.filter((d) => d.status === 'failed').length;
  const skipped = databases.filter((d) => d.status === 'skipped').length;

  return {
    available,
    matched: plans.length,
    total: plans.length - skipped,
    succeeded,
    failed,
    skipped,
    databases,
  };
}

/**
 * Bind the (role, ACL) pair to every database matching the filter
 *
 * @throws InvalidFilterPatternError before any request when the filter is bad
 * @throws RequestError when the database list cannot be fetched
 */
export async function grantDatabasePermissions(
  client: ClusterClient,
  options: GrantOptions,
  { logger: log = defaultLogger }: ApplyPermissionOptions = {}
): Promise<PermissionSummary> {
  const filter = compileDatabaseFilter(options.filter);
  const all = await client.databases.list();

  if (all.length === 0) {
    log.info('No databases found');
  }

  const matched = filterDatabases(all, filter);
  if (filter) {
    log.info(`Filtered to ${matched.length} databases matching pattern '${options.filter}'`);
  }

  const plans = planGrant(matched, options, options.skipExisting ?? false);
  const summary = await applyPlans(client, plans, all.length, log);

  log.info(
    `Successfully updated permissions for ${summary.succeeded}/${summary.total} databases`
  );
  return summary;
}

/**
 * Remove the (role, ACL) pair from every database matching the filter
 */
export async function revokeDatabasePermissions(
  client: ClusterClient,
  options: RevokeOptions,
  { logger: log = defaultLogger }: ApplyPermissionOptions = {}
): Promise<PermissionSummary> {
  const filter = compileDatabaseFilter(options.filter);
  const all = await client.databases.list();
  const plans = planRevoke(filterDatabases(all, filter), options);
  const summary = await applyPlans(client, plans, all.length, log);

  log.info(
    `Successfully cleaned up permissions for ${summary.succeeded}/${summary.total} databases`
  );
  return summary;
}
