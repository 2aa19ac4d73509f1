/**
 * repair command - Create only the components an agent is missing
 */

import type { ProvisionResult } from '../reconcilers/agents/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import { header, verbose } from '../utils/output.js';
import type { ProvisionOptions } from './create.js';
import {
  connect,
  createManager,
  isConnection,
  provisionFailure,
  provisionSuccess,
  resolveConnection,
  withAgentPassword,
} from './common.js';

export type RepairOptions = ProvisionOptions;

/**
 * Execute the repair command
 */
export async function repairCommand(
  ctx: CommandContext,
  options: RepairOptions = {}
): Promise<CommandResult<ProvisionResult>> {
  const connection = resolveConnection(ctx);
  if (!isConnection(connection)) {
    return connection;
  }

  verbose(`Executing repair command for agent '${connection.agentName}'`, ctx.options.verbose);
  if (ctx.outputFormat === 'human') {
    header('Repair Agent Permissions');
  }

  const client = await connect(ctx, connection);
  if (!client) {
    return { success: false, message: `Failed to connect to ${connection.endpoint}` };
  }

  try {
    const manager = createManager(ctx, client);
    const result = await withAgentPassword(ctx, options.agentPassword, (agentPassword) =>
      manager.repair({
        agentName: connection.agentName,
        agentPassword,
        agentEmail: options.agentEmail,
        aclRules: options.aclRules,
        roleManagement: options.roleManagement,
        databaseFilter: options.databaseFilter,
        skipExisting: options.skipExisting,
        skipAllDatabases: options.skipAllDatabases,
        skipUserCreation: options.skipUserCreation,
      })
    );
    const changed = result.created.length + result.adopted.length > 0;
    return provisionSuccess(ctx, changed ? 'repaired' : 'already complete', result);
  } catch (err) {
    return provisionFailure('Repair', err);
  }
}
