/**
 * Agent manager
 *
 * Drives create, update and repair for one agent on one cluster. Every
 * operation looks the agent up and classifies it before changing anything.
 */

import type { ClusterClient } from '../../api/client.js';
import { logger as defaultLogger } from '../../api/logger.js';
import {
  DEFAULT_CONFLICT_RETRY,
  DEFAULT_DELETION_POLL,
  resolvePolicy,
  sleep as defaultSleep,
} from '../../api/retry.js';
import type { Acl, Role, User } from '../../api/types.js';
import { compileDatabaseFilter } from '../permissions/diff.js';
import { grantDatabasePermissions } from '../permissions/apply.js';
import type { PermissionSummary } from '../permissions/types.js';
import {
  AlreadyFullyProvisionedError,
  AlreadyPartiallyProvisionedError,
  DEFAULT_ACL_RULES,
  DEFAULT_ROLE_MANAGEMENT,
  DEFAULT_USER_ALIASES,
  MissingAgentPasswordError,
  NoComponentsFoundError,
  ResourceNotFoundError,
  type AgentComponents,
  type AgentManagerOptions,
  type ComponentKind,
  type CreateRequest,
  type PermissionScope,
  type ProvisionResult,
  type RepairRequest,
  type UpdateRequest,
} from './types.js';
import {
  aclNameFor,
  classifyAgent,
  defaultAgentEmail,
  findExistingAgent,
  missingComponents,
  presentComponents,
  roleNameFor,
} from './lookup.js';
import { ensureAcl, ensureRole, ensureUser, teardownAgent, type EnsureContext } from './ensure.js';

export class AgentManager {
  private readonly ctx: EnsureContext;
  private readonly userAliases: readonly string[];

  constructor(client: ClusterClient, options: AgentManagerOptions = {}) {
    this.ctx = {
      client,
      conflictRetry: resolvePolicy(DEFAULT_CONFLICT_RETRY, options.conflictRetry),
      deletionPoll: resolvePolicy(DEFAULT_DELETION_POLL, options.deletionPoll),
      sleep: options.sleep ?? defaultSleep,
      logger: options.logger ?? defaultLogger,
    };
    this.userAliases = options.userAliases ?? DEFAULT_USER_ALIASES;
  }

  /**
   * Look up the agent's current resources
   */
  find(agentName: string): Promise<AgentComponents> {
    return findExistingAgent(this.ctx.client, agentName, {
      userAliases: this.userAliases,
      logger: this.ctx.logger,
    });
  }

  // ---------------------------------------------------------------------------
  // create
  // ---------------------------------------------------------------------------

  /**
   * Provision a new agent, or recreate one with `force`
   *
   * @throws AlreadyPartiallyProvisionedError / AlreadyFullyProvisionedError without force
   * @throws InvalidFilterPatternError / MissingAgentPasswordError before any mutation
   */
  async create(request: CreateRequest): Promise<ProvisionResult> {
    const { agentName } = request;
    this.validateInputs(request);

    const existing = await this.find(agentName);
    const state = classifyAgent(existing);
    let deleted: ComponentKind[] = [];

    if (state === 'PARTIAL' && !request.force) {
      throw new AlreadyPartiallyProvisionedError(
        agentName,
        presentComponents(existing),
        missingComponents(existing)
      );
    }
    if (state === 'COMPLETE' && !request.force) {
      throw new AlreadyFullyProvisionedError(agentName);
    }
    if (this.needsPassword(request, {})) {
      throw new MissingAgentPasswordError(agentName);
    }
    if (state !== 'ABSENT') {
      this.ctx.logger.info(`Force recreating components for agent '${agentName}'`);
      deleted = await teardownAgent(this.ctx, agentName, existing, request.databaseFilter);
    }

    const result = await this.provisionMissing(request, {});
    return { ...result, state, deleted };
  }

  // ---------------------------------------------------------------------------
  // update
  // ---------------------------------------------------------------------------

  /**
   * Re-apply database bindings for an existing agent. Identity resources are
   * never created or deleted.
   *
   * @throws ResourceNotFoundError when the ACL or role is missing
   * @throws RequestError when the ACL or role list cannot be fetched
   */
  async update(request: UpdateRequest): Promise<ProvisionResult> {
    const { agentName } = request;
    compileDatabaseFilter(request.databaseFilter);

    const { client } = this.ctx;
    const aclName = aclNameFor(agentName);
    const acl = (await client.acls.list()).find((a) => a.name === aclName);
    if (!acl) {
      throw new ResourceNotFoundError(agentName, 'acl', aclName);
    }
    const roleName = roleNameFor(agentName);
    const role = (await client.roles.list()).find((r) => r.name === roleName);
    if (!role) {
      throw new ResourceNotFoundError(agentName, 'role', roleName);
    }
    const { user } = await this.find(agentName);

    const permissions = await this.grant(role, acl, request);
    return {
      agentName,
      state: classifyAgent({ acl, role, user }),
      acl,
      role,
      user,
      created: [],
      adopted: [],
      deleted: [],
      permissions,
    };
  }

  // ---------------------------------------------------------------------------
  // repair
  // ---------------------------------------------------------------------------

  /**
   * Create only the missing resources of a partially provisioned agent
   *
   * @throws NoComponentsFoundError when nothing exists
   */
  async repair(request: RepairRequest): Promise<ProvisionResult> {
    const { agentName } = request;
    this.validateInputs(request);

    const existing = await this.find(agentName);
    const state = classifyAgent(existing);
    if (state === 'ABSENT') {
      throw new NoComponentsFoundError(agentName);
    }
    if (this.needsPassword(request, existing)) {
      throw new MissingAgentPasswordError(agentName);
    }
    if (state === 'COMPLETE') {
      this.ctx.logger.info(`All components for agent '${agentName}' already exist`);
    } else {
      this.ctx.logger.info(
        `Repairing agent '${agentName}'; missing: ${missingComponents(existing).join(', ')}`
      );
    }

    const result = await this.provisionMissing(request, existing);
    return { ...result, state, deleted: [] };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Checks that must pass before anything is written
   */
  private validateInputs(request: RepairRequest): void {
    compileDatabaseFilter(request.databaseFilter);
  }

  private needsPassword(request: RepairRequest, existing: AgentComponents): boolean {
    return !request.skipUserCreation && !existing.user && !request.agentPassword;
  }

  /**
   * Create whatever `existing` lacks (ACL, role, user in that order), then
   * grant database permissions
   */
  private async provisionMissing(
    request: RepairRequest,
    existing: AgentComponents
  ): Promise<Omit<ProvisionResult, 'state' | 'deleted'>> {
    const { agentName } = request;
    const created: ComponentKind[] = [];
    const adopted: ComponentKind[] = [];
    const track = (kind: ComponentKind, wasAdopted: boolean): void => {
      (wasAdopted ? adopted : created).push(kind);
    };

    let acl: Acl;
    if (existing.acl) {
      acl = existing.acl;
    } else {
      const ensured = await ensureAcl(this.ctx, agentName, request.aclRules ?? DEFAULT_ACL_RULES);
      acl = ensured.resource;
      track('acl', ensured.adopted);
    }

    let role: Role;
    if (existing.role) {
      role = existing.role;
    } else {
      const ensured = await ensureRole(
        this.ctx,
        agentName,
        request.roleManagement ?? DEFAULT_ROLE_MANAGEMENT
      );
      role = ensured.resource;
      track('role', ensured.adopted);
    }

    let user: User | undefined = existing.user;
    if (!user && request.skipUserCreation) {
      this.ctx.logger.info('Skipping user creation');
    } else if (!user && request.agentPassword) {
      const ensured = await ensureUser(
        this.ctx,
        agentName,
        request.agentEmail ?? defaultAgentEmail(agentName),
        request.agentPassword,
        role.uid
      );
      user = ensured.resource;
      track('user', ensured.adopted);
    }

    let permissions: PermissionSummary | undefined;
    if (request.skipAllDatabases) {
      this.ctx.logger.info('Skipping database permission updates');
    } else {
      permissions = await this.grant(role, acl, request);
    }

    return { agentName, acl, role, user, created, adopted, permissions };
  }

  private grant(role: Role, acl: Acl, scope: PermissionScope): Promise<PermissionSummary> {
    return grantDatabasePermissions(
      this.ctx.client,
      {
        roleUid: role.uid,
        aclUid: acl.uid,
        filter: scope.databaseFilter,
        skipExisting: scope.skipExisting,
      },
      { logger: this.ctx.logger }
    );
  }
}
