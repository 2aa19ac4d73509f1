/**
 * update command - Re-apply database bindings for an existing agent
 */

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
} from './common.js';

export interface UpdateOptions {
  databaseFilter?: string;
  skipExisting?: boolean;
}

/**
 * Execute the update command
 */
export async function updateCommand(
  ctx: CommandContext,
  options: UpdateOptions = {}
): Promise<CommandResult<ProvisionResult>> {
  const connection = resolveConnection(ctx);
  if (!isConnection(connection)) {
    return connection;
  }

  verbose(`Executing update command for agent '${connection.agentName}'`, ctx.options.verbose);
  if (ctx.outputFormat === 'human') {
    header('Update Agent Permissions');
  }

  const client = await connect(ctx, connection);
  if (!client) {
    return { success: false, message: `Failed to connect to ${connection.endpoint}` };
  }

  try {
    const result = await createManager(ctx, client).update({
      agentName: connection.agentName,
      databaseFilter: options.databaseFilter,
      skipExisting: options.skipExisting,
    });
    return provisionSuccess(ctx, 'updated', result);
  } catch (err) {
    return provisionFailure('Update', err);
  }
}
