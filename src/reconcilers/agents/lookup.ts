/**
 * Agent resource lookup
 *
 * Finds the ACL, role and user that belong to an agent and classifies the
 * agent's provisioning state from what was found.
 */

import type { Acl, Role, User } from '../../api/types.js';
import type { ClusterClient } from '../../api/client.js';
import { errorMessage } from '../../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type { AgentComponents, AgentState, ComponentKind } from './types.js';
import { CREATION_ORDER, DEFAULT_USER_ALIASES } from './types.js';

// =============================================================================
// Naming
// =============================================================================

export function aclNameFor(agentName: string): string {
  return `${agentName}-acl`;
}

export function roleNameFor(agentName: string): string {
  return `${agentName}-role`;
}

export function defaultAgentEmail(agentName: string): string {
  return `${agentName}@example.com`;
}

/**
 * Expand alias templates for one agent
 *
 * @example
 * expandUserAliases('radar', ['{agent}', '{agent}@example.com'])
 * // ['radar', 'radar@example.com']
 */
export function expandUserAliases(
  agentName: string,
  templates: readonly string[] = DEFAULT_USER_ALIASES
): string[] {
  return templates.map((template) => template.split('{agent}').join(agentName));
}

/**
 * A user belongs to the agent when its name or email equals any alias
 */
export function matchesAgentUser(
  user: User,
  agentName: string,
  templates: readonly string[] = DEFAULT_USER_ALIASES
): boolean {
  const aliases = expandUserAliases(agentName, templates);
  return (
    aliases.includes(user.name) || (user.email !== undefined && aliases.includes(user.email))
  );
}

// =============================================================================
// Lookup
// =============================================================================

export interface FindOptions {
  /** Alias templates for user matching */
  userAliases?: readonly string[];
  logger?: ApiLogger;
}

/**
 * List one collection, treating any failure as "nothing found"
 */
async function safeFind<T>(
  kind: ComponentKind,
  list: () => Promise<T[]>,
  predicate: (item: T) => boolean,
  log: ApiLogger
): Promise<T | undefined> {
  try {
    return (await list()).find(predicate);
  } catch (error) {
    log.debug(`Lookup of ${kind} failed; treating as not found`, { error: errorMessage(error) });
    return undefined;
  }
}

/**
 * Find the agent's existing resources. Never throws.
 */
export async function findExistingAgent(
  client: ClusterClient,
  agentName: string,
  options: FindOptions = {}
): Promise<AgentComponents> {
  const log = options.logger ?? defaultLogger;
  const aclName = aclNameFor(agentName);
  const roleName = roleNameFor(agentName);
  const templates = options.userAliases ?? DEFAULT_USER_ALIASES;

  const acl = await safeFind<Acl>('acl', () => client.acls.list(), (a) => a.name === aclName, log);
  const role = await safeFind<Role>(
    'role',
    () => client.roles.list(),
    (r) => r.name === roleName,
    log
  );
  const user = await safeFind<User>(
    'user',
    () => client.users.list(),
    (u) => matchesAgentUser(u, agentName, templates),
    log
  );

  const components: AgentComponents = {};
  if (acl) components.acl = acl;
  if (role) components.role = role;
  if (user) components.user = user;
  return components;
}

// =============================================================================
// Classification
// =============================================================================

export function presentComponents(components: AgentComponents): ComponentKind[] {
  return CREATION_ORDER.filter((kind) => components[kind] !== undefined);
}

/**
 * Kinds not found, in creation order
 */
export function missingComponents(components: AgentComponents): ComponentKind[] {
  return CREATION_ORDER.filter((kind) => components[kind] === undefined);
}

export function isEmpty(components: AgentComponents): boolean {
  return presentComponents(components).length === 0;
}

export function classifyAgent(components: AgentComponents): AgentState {
  const present = presentComponents(components).length;
  if (present === 0) return 'ABSENT';
  if (present === CREATION_ORDER.length) return 'COMPLETE';
  return 'PARTIAL';
}
