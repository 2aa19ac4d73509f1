/**
 * Helpers shared by the single-cluster commands
 */

import type { ClusterClient } from '../api/client.js';
import { errorMessage } from '../api/errors.js';
import { AgentManager } from '../reconcilers/agents/manager.js';
import {
  MissingAgentPasswordError,
  ProvisioningError,
  type ProvisionResult,
} from '../reconcilers/agents/types.js';
import { formatPermissionSummary, info, printProvisionResult, verbose } from '../utils/output.js';
import type { CommandContext, CommandResult } from '../types.js';

/**
 * Connection settings once every required value is known
 */
export interface Connection {
  endpoint: string;
  username: string;
  password: string;
  agentName: string;
}

/**
 * Check that the global options name a cluster and an agent
 */
export function resolveConnection(ctx: CommandContext): Connection | CommandResult<never> {
  const { endpoint, username, password, agentName } = ctx.options;
  const missing: string[] = [];
  if (!endpoint) missing.push('--endpoint');
  if (!username) missing.push('--username');
  if (!password) missing.push('--password');
  if (!agentName) missing.push('--agent-name');

  if (!endpoint || !username || !password || !agentName) {
    return {
      success: false,
      message: `Missing required arguments: ${missing.join(', ')}`,
      errors: missing.map((flag) => `${flag} is required`),
    };
  }
  return { endpoint, username, password, agentName };
}

export function isConnection(value: Connection | CommandResult<never>): value is Connection {
  return 'endpoint' in value;
}

/**
 * Build the client and verify the cluster answers
 */
export async function connect(
  ctx: CommandContext,
  connection: Connection
): Promise<ClusterClient | undefined> {
  const client = ctx.createClient({
    endpoint: connection.endpoint,
    username: connection.username,
    password: connection.password,
    verifySsl: ctx.options.verifySsl,
    debug: ctx.options.verbose,
  });

  if (ctx.outputFormat === 'human') {
    info(`Testing connectivity to ${connection.endpoint}...`);
  }
  return (await client.testConnectivity()) ? client : undefined;
}

export function createManager(ctx: CommandContext, client: ClusterClient): AgentManager {
  return new AgentManager(client, { logger: ctx.logger, ...ctx.managerOptions });
}

/**
 * Run an operation; if it stops for lack of an agent password and a
 * prompter is available, ask once and run it again. The password check
 * happens before any change, so the second run starts from the same state.
 */
export async function withAgentPassword(
  ctx: CommandContext,
  agentPassword: string | undefined,
  run: (agentPassword: string | undefined) => Promise<ProvisionResult>
): Promise<ProvisionResult> {
  try {
    return await run(agentPassword);
  } catch (err) {
    if (!(err instanceof MissingAgentPasswordError) || !ctx.prompter) {
      throw err;
    }
    const prompted = await ctx.prompter.askSecret(`Enter password for agent user '${err.agentName}'`);
    return run(prompted || undefined);
  }
}

/**
 * Summarize a finished operation
 */
export function provisionSuccess(
  ctx: CommandContext,
  verb: string,
  result: ProvisionResult
): CommandResult<ProvisionResult> {
  printProvisionResult(result, ctx.outputFormat);
  verbose(`Initial state: ${result.state}`, ctx.options.verbose);

  const failedDatabases = result.permissions?.failed ?? 0;
  const permissions = result.permissions
    ? `; permissions ${formatPermissionSummary(result.permissions)}`
    : '';
  return {
    success: true,
    message: `Agent '${result.agentName}' ${verb}${permissions}`,
    data: result,
    errors:
      failedDatabases > 0
        ? (result.permissions?.databases ?? [])
            .filter((db) => db.status === 'failed')
            .map((db) => `${db.name}: ${db.error ?? 'update failed'}`)
        : undefined,
  };
}

/**
 * Turn a thrown error into a failed result
 */
export function provisionFailure(action: string, err: unknown): CommandResult<never> {
  const message = err instanceof ProvisioningError ? err.toUserMessage() : errorMessage(err);
  return {
    success: false,
    message: `${action} failed: ${message.split('\n')[0]}`,
    errors: [message],
  };
}
