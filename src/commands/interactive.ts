/**
 * interactive command - Menu-driven provisioning (default when no command
 * is given)
 */

import { classifyAgent, defaultAgentEmail } from '../reconcilers/agents/lookup.js';
import {
  DEFAULT_ADMIN_USERNAME,
  DEFAULT_AGENT_NAME,
  DEFAULT_ENDPOINT,
  ENV_AGENT_USER,
  readEnv,
} from '../config/env.js';
import type { CommandContext, CommandResult } from '../types.js';
import type { Prompter } from '../utils/prompt.js';
import { info, printResult, warn } from '../utils/output.js';
import { connect, createManager, isConnection, resolveConnection } from './common.js';
import { createCommand, type ProvisionOptions } from './create.js';
import { updateCommand } from './update.js';
import { repairCommand } from './repair.js';
import { provisionCommand } from './provision.js';

export type InteractiveOptions = ProvisionOptions;

/**
 * Answers remembered between rounds
 */
interface LastValues {
  endpoint?: string;
  username?: string;
  agentName?: string;
  configPath?: string;
}

type ExistingAgentAction = 'update' | 'rename' | 'repair' | 'force' | 'exit';

async function runSingleCluster(
  ctx: CommandContext,
  prompter: Prompter,
  options: InteractiveOptions,
  last: LastValues
): Promise<CommandResult> {
  const endpoint = await prompter.ask(
    'Enter cluster endpoint',
    last.endpoint ?? ctx.options.endpoint ?? DEFAULT_ENDPOINT
  );
  const username = await prompter.ask(
    'Enter admin username',
    last.username ?? ctx.options.username ?? readEnv(ENV_AGENT_USER) ?? DEFAULT_ADMIN_USERNAME
  );
  const password = ctx.options.password ?? (await prompter.askSecret('Enter admin password'));
  const agentName = await prompter.ask(
    'Enter agent name for permissions',
    last.agentName ?? ctx.options.agentName ?? DEFAULT_AGENT_NAME
  );

  const roundCtx: CommandContext = {
    ...ctx,
    options: { ...ctx.options, endpoint, username, password, agentName },
  };
  const connection = resolveConnection(roundCtx);
  if (!isConnection(connection)) {
    return connection;
  }
  Object.assign(last, { endpoint, username, agentName });

  const client = await connect(roundCtx, connection);
  if (!client) {
    return { success: false, message: `Failed to connect to ${endpoint}` };
  }

  const state = classifyAgent(await createManager(roundCtx, client).find(agentName));
  if (state === 'ABSENT') {
    info(`Permissions for agent '${agentName}' do not exist. Creating new permissions...`);
    const agentEmail =
      options.agentEmail ?? (await prompter.ask('Enter agent email', defaultAgentEmail(agentName)));
    return createCommand(roundCtx, { ...options, agentEmail });
  }

  warn(
    state === 'COMPLETE'
      ? `Permissions for agent '${agentName}' already exist`
      : `Permissions for agent '${agentName}' are partially provisioned`
  );
  const action = await prompter.choose<ExistingAgentAction>('What would you like to do?', [
    { value: 'update', label: 'Update permissions for existing agent' },
    { value: 'rename', label: 'Create permissions for a new agent with a different name' },
    { value: 'repair', label: 'Repair missing components (create only missing ACL, role, user)' },
    { value: 'force', label: 'Force recreate existing components (delete and recreate ACL, role, user)' },
    { value: 'exit', label: 'Exit' },
  ]);

  switch (action) {
    case 'update':
      return updateCommand(roundCtx, options);
    case 'rename': {
      const newName = await prompter.ask('Enter new agent name', `${agentName}-new`);
      const agentPassword = await prompter.askSecret('Enter agent password');
      const agentEmail = await prompter.ask('Enter agent email/username', defaultAgentEmail(newName));
      last.agentName = newName;
      return createCommand(
        { ...roundCtx, options: { ...roundCtx.options, agentName: newName } },
        { ...options, agentPassword: agentPassword || undefined, agentEmail, force: false }
      );
    }
    case 'repair':
      return repairCommand(roundCtx, options);
    case 'force':
      return createCommand(roundCtx, { ...options, force: true });
    case 'exit':
      return { success: false, message: 'Operation cancelled by user' };
  }
}

async function runMultiCluster(
  ctx: CommandContext,
  prompter: Prompter,
  options: InteractiveOptions,
  last: LastValues
): Promise<CommandResult> {
  const config = await prompter.ask('Enter path to agent YAML config file', last.configPath);
  if (!config) {
    return { success: false, message: 'Config file path is required' };
  }
  last.configPath = config;
  return provisionCommand(ctx, { ...options, config });
}

/**
 * Execute the interactive command
 */
export async function interactiveCommand(
  ctx: CommandContext,
  options: InteractiveOptions = {}
): Promise<CommandResult> {
  const { prompter } = ctx;
  if (!prompter) {
    return {
      success: false,
      message: 'Interactive mode requires a terminal; use create, update, repair or provision',
    };
  }

  const last: LastValues = {};
  let result: CommandResult = { success: true, message: 'Nothing to do' };

  for (;;) {
    const mode = await prompter.choose('Select provisioning mode', [
      { value: 'single', label: 'Single cluster' },
      { value: 'multi', label: 'Multiple clusters from agent YAML config' },
      { value: 'exit', label: 'Exit' },
    ]);
    if (mode === 'exit') {
      return result;
    }

    result =
      mode === 'single'
        ? await runSingleCluster(ctx, prompter, options, last)
        : await runMultiCluster(ctx, prompter, options, last);
    printResult(result, 'human');

    if (!(await prompter.confirm('Would you like to provision another cluster?', false))) {
      return result;
    }
  }
}
