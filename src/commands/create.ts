/**
 * create command - Provision an agent's ACL, role, user and database bindings
 */

import type { RoleManagement } from '../api/types.js';
import type { ProvisionResult } from '../reconcilers/agents/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { header, verbose } from '../utils/output.js';
import {
  connect,
  createManager,
  isConnection,
  provisionFailure,
  provisionSuccess,
  resolveConnection,
  withAgentPassword,
} from './common.js';

/**
 * Options shared by create and repair
 */
export interface ProvisionOptions {
  agentPassword?: string;
  agentEmail?: string;
  aclRules?: string;
  roleManagement?: RoleManagement;
  databaseFilter?: string;
  skipExisting?: boolean;
  skipAllDatabases?: boolean;
  skipUserCreation?: boolean;
}

export interface CreateOptions extends ProvisionOptions {
  /** Delete and recreate existing components */
  force?: boolean;
}

/**
 * Execute the create command
 */
export async function createCommand(
  ctx: CommandContext,
  options: CreateOptions = {}
): Promise<CommandResult<ProvisionResult>> {
  const connection = resolveConnection(ctx);
  if (!isConnection(connection)) {
    return connection;
  }

  verbose(`Executing create command for agent '${connection.agentName}'`, ctx.options.verbose);
  if (ctx.outputFormat === 'human') {
    header(options.force ? 'Force Recreate Agent Permissions' : 'Create Agent Permissions');
  }

  const client = await connect(ctx, connection);
  if (!client) {
    return { success: false, message: `Failed to connect to ${connection.endpoint}` };
  }

  try {
    const manager = createManager(ctx, client);
    const result = await withAgentPassword(ctx, options.agentPassword, (agentPassword) =>
      manager.create({
        agentName: connection.agentName,
        agentPassword,
        agentEmail: options.agentEmail,
        aclRules: options.aclRules,
        roleManagement: options.roleManagement,
        databaseFilter: options.databaseFilter,
        skipExisting: options.skipExisting,
        skipAllDatabases: options.skipAllDatabases,
        skipUserCreation: options.skipUserCreation,
        force: options.force,
      })
    );
    return provisionSuccess(ctx, options.force ? 'recreated' : 'created', result);
  } catch (err) {
    return provisionFailure('Create', err);
  }
}
