/**
 * Agent identity types for the provisioning reconciler
 *
 * An agent is represented on a cluster by three named resources:
 *   ACL  `<agent>-acl`
 *   role `<agent>-role`
 *   user (matched by name or email aliases)
 */

import type { Acl, Role, User, RoleManagement, RetryPolicy, Sleeper } from '../../api/types.js';
import type { ApiLogger } from '../../api/logger.js';
import type { PermissionSummary } from '../permissions/types.js';

/**
 * The three identity resources, in creation order
 */
export type ComponentKind = 'acl' | 'role' | 'user';

export const CREATION_ORDER: readonly ComponentKind[] = ['acl', 'role', 'user'];

/** Reverse of creation order */
export const DELETION_ORDER: readonly ComponentKind[] = ['user', 'role', 'acl'];

/**
 * Which of an agent's resources currently exist
 */
export interface AgentComponents {
  acl?: Acl;
  role?: Role;
  user?: User;
}

/**
 * Provisioning state derived from a lookup
 * - ABSENT: none of the three exist
 * - PARTIAL: one or two exist
 * - COMPLETE: all three exist
 */
export type AgentState = 'ABSENT' | 'PARTIAL' | 'COMPLETE';

/**
 * Default rule string for monitoring agents
 */
export const DEFAULT_ACL_RULES = '+@read +info +ping +config|get +client|list +memory +latency';

export const DEFAULT_ROLE_MANAGEMENT: RoleManagement = 'cluster_member';

/**
 * Alias templates tried when looking for an agent's existing user.
 * `{agent}` is replaced with the agent name; a user matches when its name
 * or email equals any expanded alias.
 */
export const DEFAULT_USER_ALIASES: readonly string[] = [
  '{agent}',
  '{agent}@example.com',
  '{agent}@re.demo',
];

// =============================================================================
// Operation Requests
// =============================================================================

/**
 * Options shared by every operation that touches database permissions
 */
export interface PermissionScope {
  /** Regular expression matched (unanchored) against database names */
  databaseFilter?: string;
  /** Leave already-bound databases out of the tally instead of counting them */
  skipExisting?: boolean;
}

export interface UpdateRequest extends PermissionScope {
  agentName: string;
}

export interface RepairRequest extends PermissionScope {
  agentName: string;
  /** Required when a user has to be created */
  agentPassword?: string;
  /** Defaults to `<agent>@example.com` */
  agentEmail?: string;
  aclRules?: string;
  roleManagement?: RoleManagement;
  /** Only create identity resources */
  skipAllDatabases?: boolean;
  /** Do not create a dedicated user (external credentials are reused) */
  skipUserCreation?: boolean;
}

export interface CreateRequest extends RepairRequest {
  /** Delete and recreate existing resources */
  force?: boolean;
}

/**
 * Constructor options for the AgentManager
 */
export interface AgentManagerOptions {
  /** Policy for creates that hit HTTP 409 (default 5 x 3000ms) */
  conflictRetry?: Partial<RetryPolicy>;
  /** Policy for waiting on delete propagation (default 10 x 2000ms) */
  deletionPoll?: Partial<RetryPolicy>;
  sleep?: Sleeper;
  logger?: ApiLogger;
  /** Replaces DEFAULT_USER_ALIASES */
  userAliases?: readonly string[];
}

// =============================================================================
// Results
// =============================================================================

/**
 * Outcome of create/update/repair
 */
export interface ProvisionResult {
  agentName: string;
  /** State observed before any change */
  state: AgentState;
  acl: Acl;
  role: Role;
  /** Absent when user creation was skipped */
  user?: User;
  /** Resources created by this run */
  created: ComponentKind[];
  /** Resources adopted after a conflict that outlived the retry policy */
  adopted: ComponentKind[];
  /** Resources removed by a forced recreate, in deletion order */
  deleted: ComponentKind[];
  /** Absent when database permissions were skipped */
  permissions?: PermissionSummary;
}

// =============================================================================
// Errors
// =============================================================================

export type ProvisioningErrorCode =
  | 'ALREADY_PARTIALLY_PROVISIONED'
  | 'ALREADY_FULLY_PROVISIONED'
  | 'NO_COMPONENTS_FOUND'
  | 'RESOURCE_NOT_FOUND'
  | 'INVALID_FILTER_PATTERN'
  | 'CONFLICT_EXHAUSTED'
  | 'MISSING_AGENT_PASSWORD';

/**
 * Base class for policy failures surfaced to the operator
 */
export class ProvisioningError extends Error {
  constructor(
    message: string,
    public readonly code: ProvisioningErrorCode,
    public readonly suggestion?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ProvisioningError';
  }

  /**
   * Message with the suggestion appended
   */
  toUserMessage(): string {
    return this.suggestion ? `${this.message}\n${this.suggestion}` : this.message;
  }
}

export class AlreadyPartiallyProvisionedError extends ProvisioningError {
  constructor(
    public readonly agentName: string,
    public readonly present: ComponentKind[],
    public readonly missing: ComponentKind[]
  ) {
    super(
      `Partial components found for agent '${agentName}'. Missing components: ${missing.join(', ')}`,
      'ALREADY_PARTIALLY_PROVISIONED',
      'Use --force to recreate the components or repair to create only the missing ones.'
    );
    this.name = 'AlreadyPartiallyProvisionedError';
  }
}

export class AlreadyFullyProvisionedError extends ProvisioningError {
  constructor(public readonly agentName: string) {
    super(
      `All components for agent '${agentName}' already exist`,
      'ALREADY_FULLY_PROVISIONED',
      'Use --force to recreate existing components or update to update existing permissions.'
    );
    this.name = 'AlreadyFullyProvisionedError';
  }
}

export class NoComponentsFoundError extends ProvisioningError {
  constructor(public readonly agentName: string) {
    super(
      `No components found for agent '${agentName}'`,
      'NO_COMPONENTS_FOUND',
      'Use create to provision a new agent.'
    );
    this.name = 'NoComponentsFoundError';
  }
}

export class ResourceNotFoundError extends ProvisioningError {
  constructor(
    public readonly agentName: string,
    public readonly kind: ComponentKind,
    public readonly resourceName: string
  ) {
    super(
      `Could not find ${kind === 'acl' ? 'ACL' : kind} for agent '${agentName}': ${resourceName}`,
      'RESOURCE_NOT_FOUND',
      'Use create or repair to provision the missing resource.'
    );
    this.name = 'ResourceNotFoundError';
  }
}

export class InvalidFilterPatternError extends ProvisioningError {
  constructor(public readonly pattern: string, reason: string) {
    super(`Invalid regex pattern '${pattern}': ${reason}`, 'INVALID_FILTER_PATTERN');
    this.name = 'InvalidFilterPatternError';
  }
}

export class ConflictExhaustedError extends ProvisioningError {
  constructor(
    public readonly kind: ComponentKind,
    public readonly resourceName: string,
    public readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(
      `${kind === 'acl' ? 'ACL' : kind[0].toUpperCase() + kind.slice(1)} '${resourceName}' still conflicts after ${attempts} attempts`,
      'CONFLICT_EXHAUSTED',
      'Use --force to recreate.',
      options
    );
    this.name = 'ConflictExhaustedError';
  }
}

export class MissingAgentPasswordError extends ProvisioningError {
  constructor(public readonly agentName: string) {
    super(
      `An agent password is required to create the user for '${agentName}'`,
      'MISSING_AGENT_PASSWORD',
      'Pass --agent-password, set AGENT_PASSWORD, or use --skip-user-creation.'
    );
    this.name = 'MissingAgentPasswordError';
  }
}
