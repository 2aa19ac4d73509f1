/**
 * provision command - Provision an agent on every ENTERPRISE deployment in
 * an agent YAML config
 */

import { loadClusterTargets } from '../config/deployments.js';
import { DEFAULT_ADMIN_USERNAME, DEFAULT_AGENT_NAME } from '../config/env.js';
import { ConfigError, type ClusterTargetsResult } from '../config/types.js';
import { errorMessage } from '../api/errors.js';
import { provisionClusters } from '../reconcilers/clusters/batch.js';
import type { BatchProvisionResult, CredentialPrompter } from '../reconcilers/clusters/types.js';
import type { CommandContext, CommandResult } from '../types.js';
import type { Prompter } from '../utils/prompt.js';
import { header, info, printBatchResult, verbose, warn } from '../utils/output.js';
import type { CreateOptions } from './create.js';

export interface ProvisionConfigOptions extends Omit<CreateOptions, 'skipUserCreation'> {
  /** Path to the agent YAML config */
  config: string;
}

/**
 * Adapt terminal prompts to the credential callbacks the batch expects
 */
export function credentialPrompter(prompter: Prompter): CredentialPrompter {
  return {
    adminUsername: (target) =>
      prompter.ask(`Enter admin username for provisioning ${target.name}`, DEFAULT_ADMIN_USERNAME),
    adminPassword: (target) => prompter.askSecret(`Enter admin password for provisioning ${target.name}`),
    agentPassword: (target) => prompter.askSecret(`Enter agent password for ${target.name}`),
  };
}

/**
 * Execute the provision command
 */
export async function provisionCommand(
  ctx: CommandContext,
  options: ProvisionConfigOptions
): Promise<CommandResult<BatchProvisionResult>> {
  const human = ctx.outputFormat === 'human';
  verbose(`Loading deployments from ${options.config}`, ctx.options.verbose);
  if (human) {
    header('Multi-Cluster Provisioning');
  }

  let loaded: ClusterTargetsResult;
  try {
    loaded = loadClusterTargets(options.config);
  } catch (err) {
    return {
      success: false,
      message: err instanceof ConfigError ? err.message : `Failed to load config: ${errorMessage(err)}`,
    };
  }

  for (const warning of loaded.warnings) {
    ctx.logger.warn(warning);
  }
  for (const rejected of loaded.rejected) {
    if (human) {
      warn(`Skipping ${rejected.name}: ${rejected.reason}`);
    }
  }

  const { targets } = loaded;
  if (targets.length === 0) {
    return {
      success: false,
      message: 'No valid cluster configurations found',
      errors: loaded.rejected.map((r) => `${r.name}: ${r.reason}`),
    };
  }

  if (human) {
    info(`Ready to provision ${targets.length} cluster(s):`);
    for (const target of targets) {
      info(`  ${target.name}: ${target.endpoint}${target.username ? '' : ' (credentials will be prompted)'}`);
    }
  }

  let agentName = ctx.options.agentName;
  if (!agentName && ctx.prompter) {
    agentName = await ctx.prompter.ask('Enter agent name for permissions', DEFAULT_AGENT_NAME);
  }
  if (!agentName) {
    return { success: false, message: 'Missing required arguments: --agent-name' };
  }

  const result = await provisionClusters(
    targets,
    {
      agentName,
      agentPassword: options.agentPassword,
      agentEmail: options.agentEmail,
      aclRules: options.aclRules,
      roleManagement: options.roleManagement,
      databaseFilter: options.databaseFilter,
      skipExisting: options.skipExisting,
      skipAllDatabases: options.skipAllDatabases,
      force: options.force,
      verifySsl: ctx.options.verifySsl,
    },
    {
      createClient: ctx.createClient,
      prompter: ctx.prompter ? credentialPrompter(ctx.prompter) : undefined,
      managerOptions: ctx.managerOptions,
      logger: ctx.logger,
    }
  );

  printBatchResult(result, ctx.outputFormat);

  return {
    success: result.success,
    message: `Multi-cluster provisioning completed: ${result.succeeded}/${result.total} clusters successful`,
    data: result,
    errors: result.clusters
      .filter((c) => !c.success)
      .map((c) => `${c.name}: ${c.error ?? 'failed'}`),
  };
}
