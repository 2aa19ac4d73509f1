/**
 * Agent resource ensure and teardown
 *
 * Key behaviors:
 * - Creates retry on HTTP 409 under the conflict policy
 * - A conflict that outlives the policy adopts a same-named resource, if any
 * - Teardown deletes user, then role, then ACL, waiting for each to vanish
 */

import type { ClusterClient } from '../../api/client.js';
import { errorMessage, isConflictError } from '../../api/errors.js';
import type { ApiLogger } from '../../api/logger.js';
import { pollUntil, withRetry } from '../../api/retry.js';
import type { Acl, RetryPolicy, Role, RoleManagement, Sleeper, User } from '../../api/types.js';
import { revokeDatabasePermissions } from '../permissions/apply.js';
import type { AgentComponents, ComponentKind } from './types.js';
import { ConflictExhaustedError, DELETION_ORDER } from './types.js';
import { aclNameFor, roleNameFor } from './lookup.js';

/**
 * Context shared by the ensure and teardown steps
 */
export interface EnsureContext {
  client: ClusterClient;
  conflictRetry: Required<RetryPolicy>;
  deletionPoll: Required<RetryPolicy>;
  sleep: Sleeper;
  logger: ApiLogger;
}

export interface EnsureResult<T> {
  resource: T;
  /** True when an existing resource was taken over after conflicts */
  adopted: boolean;
}

const LABELS: Record<ComponentKind, string> = {
  acl: 'ACL',
  role: 'Role',
  user: 'User',
};

// =============================================================================
// Create With Conflict Policy
// =============================================================================

/**
 * Create a resource, retrying name conflicts and adopting on exhaustion
 *
 * @throws ConflictExhaustedError when conflicts persist and nothing can be
 *   adopted, or the lookup for adoption fails (the failure is the cause)
 * @throws the underlying error for any non-conflict failure
 */
export async function ensureResource<T>(
  ctx: EnsureContext,
  kind: ComponentKind,
  name: string,
  create: () => Promise<T>,
  findByName: () => Promise<T | undefined>
): Promise<EnsureResult<T>> {
  const result = await withRetry(() => create(), ctx.conflictRetry, {
    logger: ctx.logger,
    sleep: ctx.sleep,
    isRetryable: isConflictError,
    onRetry: (attempt, _error, delayMs) => {
      ctx.logger.warn(
        `${LABELS[kind]} '${name}' conflicts (attempt ${attempt}/${ctx.conflictRetry.maxAttempts}); retrying in ${delayMs}ms`
      );
    },
  });

  if (result.success && result.data !== undefined) {
    ctx.logger.info(`Created ${LABELS[kind]}: ${name}`);
    return { resource: result.data, adopted: false };
  }

  if (!isConflictError(result.error)) {
    throw result.error ?? new Error(`Failed to create ${LABELS[kind]} '${name}'`);
  }

  let existing: T | undefined;
  try {
    existing = await findByName();
  } catch (error) {
    throw new ConflictExhaustedError(kind, name, result.attempts, { cause: error });
  }
  if (existing !== undefined) {
    ctx.logger.warn(`${LABELS[kind]} '${name}' already exists; using the existing one`);
    return { resource: existing, adopted: true };
  }

  throw new ConflictExhaustedError(kind, name, result.attempts);
}

export function ensureAcl(
  ctx: EnsureContext,
  agentName: string,
  rules: string
): Promise<EnsureResult<Acl>> {
  const name = aclNameFor(agentName);
  return ensureResource(
    ctx,
    'acl',
    name,
    () => ctx.client.acls.create({ name, acl: rules }),
    async () => (await ctx.client.acls.list()).find((acl) => acl.name === name)
  );
}

export function ensureRole(
  ctx: EnsureContext,
  agentName: string,
  management: RoleManagement
): Promise<EnsureResult<Role>> {
  const name = roleNameFor(agentName);
  return ensureResource(
    ctx,
    'role',
    name,
    () => ctx.client.roles.create({ name, management }),
    async () => (await ctx.client.roles.list()).find((role) => role.name === name)
  );
}

/**
 * Create the agent's user bound to `roleUid`. Adoption is by exact name.
 */
export function ensureUser(
  ctx: EnsureContext,
  agentName: string,
  email: string,
  password: string,
  roleUid: number
): Promise<EnsureResult<User>> {
  return ensureResource(
    ctx,
    'user',
    agentName,
    () => ctx.client.users.create({ name: agentName, email, password, role_uids: [roleUid] }),
    async () => (await ctx.client.users.list()).find((user) => user.name === agentName)
  );
}

// =============================================================================
// Teardown
// =============================================================================

/**
 * Poll until a resource no longer appears in its listing.
 * Running out of checks only logs a warning.
 */
export async function waitForDeletion(
  ctx: EnsureContext,
  kind: ComponentKind,
  exists: () => Promise<boolean>
): Promise<boolean> {
  const gone = await pollUntil(async () => !(await exists()), ctx.deletionPoll, {
    logger: ctx.logger,
    sleep: ctx.sleep,
    onPending: (attempt, max) => {
      ctx.logger.info(`Waiting for ${LABELS[kind]} deletion to complete... (${attempt}/${max})`);
    },
  });

  if (!gone) {
    ctx.logger.warn(`Timeout waiting for ${LABELS[kind]} deletion; continuing`);
  }
  return gone;
}

/**
 * Remove an agent's existing resources ahead of a forced recreate
 *
 * Bindings for the role/ACL pair are revoked first when both exist, on the
 * databases matching `filter` only; a failed revoke is only a warning. A
 * failed delete propagates.
 * @returns the kinds deleted, in deletion order
 */
export async function teardownAgent(
  ctx: EnsureContext,
  agentName: string,
  components: AgentComponents,
  filter?: string
): Promise<ComponentKind[]> {
  const { client, logger } = ctx;

  if (components.acl && components.role) {
    try {
      await revokeDatabasePermissions(
        client,
        { roleUid: components.role.uid, aclUid: components.acl.uid, filter },
        { logger }
      );
    } catch (error) {
      logger.warn(`Failed to clean up database permissions: ${errorMessage(error)}`);
    }
  }

  const deleted: ComponentKind[] = [];
  for (const kind of DELETION_ORDER) {
    switch (kind) {
      case 'user': {
        const user = components.user;
        if (!user) break;
        await client.users.delete(user.uid);
        logger.info(`Deleted User: ${user.name}`);
        await waitForDeletion(ctx, kind, async () =>
          (await client.users.list()).some((u) => u.name === user.name)
        );
        deleted.push(kind);
        break;
      }
      case 'role': {
        const role = components.role;
        if (!role) break;
        await client.roles.delete(role.uid);
        logger.info(`Deleted Role: ${role.name}`);
        await waitForDeletion(ctx, kind, async () =>
          (await client.roles.list()).some((r) => r.name === roleNameFor(agentName))
        );
        deleted.push(kind);
        break;
      }
      case 'acl': {
        const acl = components.acl;
        if (!acl) break;
        await client.acls.delete(acl.uid);
        logger.info(`Deleted ACL: ${acl.name}`);
        await waitForDeletion(ctx, kind, async () =>
          (await client.acls.list()).some((a) => a.name === aclNameFor(agentName))
        );
        deleted.push(kind);
        break;
      }
    }
  }

  return deleted;
}
