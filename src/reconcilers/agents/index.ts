/**
 * Agent identity reconciler
 *
 * Provides:
 * - Lookup and classification of an agent's ACL, role and user
 * - Create with conflict retry and adoption, forced teardown
 * - AgentManager for create, update and repair
 */

export type {
  ComponentKind,
  AgentComponents,
  AgentState,
  PermissionScope,
  UpdateRequest,
  RepairRequest,
  CreateRequest,
  AgentManagerOptions,
  ProvisionResult,
  ProvisioningErrorCode,
} from './types.js';

export {
  CREATION_ORDER,
  DELETION_ORDER,
  DEFAULT_ACL_RULES,
  DEFAULT_ROLE_MANAGEMENT,
  DEFAULT_USER_ALIASES,
  ProvisioningError,
  AlreadyPartiallyProvisionedError,
  AlreadyFullyProvisionedError,
  NoComponentsFoundError,
  ResourceNotFoundError,
  InvalidFilterPatternError,
  ConflictExhaustedError,
  MissingAgentPasswordError,
} from './types.js';

export {
  aclNameFor,
  roleNameFor,
  defaultAgentEmail,
  expandUserAliases,
  matchesAgentUser,
  findExistingAgent,
  presentComponents,
  missingComponents,
  isEmpty,
  classifyAgent,
} from './lookup.js';
export type { FindOptions } from './lookup.js';

export {
  ensureResource,
  ensureAcl,
  ensureRole,
  ensureUser,
  waitForDeletion,
  teardownAgent,
} from './ensure.js';
export type { EnsureContext, EnsureResult } from './ensure.js';

export { AgentManager } from './manager.js';
