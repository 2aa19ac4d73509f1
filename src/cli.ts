/**
 * agent-provisioner CLI - Manage monitoring agent permissions on database clusters
 *
 * Commands:
 * - create: Provision ACL, role, user and database bindings (--force recreates)
 * - update: Re-apply database bindings for an existing agent
 * - repair: Create only the missing components
 * - provision: Provision every ENTERPRISE deployment in an agent YAML config
 * - interactive: Menu-driven mode (default)
 */

import { Command, Option } from 'commander';
import { createClient } from './api/client.js';
import { createLogger, logger as defaultLogger, type LogSink } from './api/logger.js';
import { ROLE_MANAGEMENT_LEVELS, type RoleManagement } from './api/types.js';
import {
  agentPasswordFromEnv,
  ENV_ADMIN_PASSWORD,
  ENV_ADMIN_USER,
  ENV_AGENT_NAME,
  ENV_AGENT_USER,
} from './config/index.js';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import {
  createCommand,
  updateCommand,
  repairCommand,
  provisionCommand,
  interactiveCommand,
  type ProvisionOptions,
} from './commands/index.js';
import { printResult, error, info } from './utils/output.js';
import { createTerminalPrompter, PromptCancelledError } from './utils/prompt.js';

const VERSION = '0.1.0';

/**
 * Options as commander hands them over for create/repair/provision
 */
interface ProvisionCliOptions {
  agentPassword?: string;
  agentEmail?: string;
  aclRules?: string;
  roleManagement?: RoleManagement;
  databaseFilter?: string;
  skipExisting: boolean;
  skipAllDatabases: boolean;
  skipUserCreation: boolean;
  force: boolean;
}

interface UpdateCliOptions {
  databaseFilter?: string;
  skipExisting: boolean;
}

/** Keeps --json stdout parseable */
const stderrSink: LogSink = {
  write(_level, line) {
    console.error(line);
  },
};

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  const base = defaultLogger.getConfig();
  const logger = createLogger(
    {
      ...base,
      level: options.verbose ? 'debug' : base.level,
    },
    options.json ? stderrSink : undefined
  );

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    logger,
    createClient: (config) => createClient(config, logger),
    prompter: process.stdin.isTTY && !options.json ? createTerminalPrompter() : undefined,
  };
}

function toProvisionOptions(cmdOpts: ProvisionCliOptions): ProvisionOptions {
  return {
    agentPassword: cmdOpts.agentPassword ?? agentPasswordFromEnv(),
    agentEmail: cmdOpts.agentEmail,
    aclRules: cmdOpts.aclRules,
    roleManagement: cmdOpts.roleManagement,
    databaseFilter: cmdOpts.databaseFilter,
    skipExisting: cmdOpts.skipExisting,
    skipAllDatabases: cmdOpts.skipAllDatabases,
    skipUserCreation: cmdOpts.skipUserCreation,
  };
}

/**
 * Attach the options shared by the provisioning commands
 */
function withProvisionOptions(command: Command, { force = true, user = true } = {}): Command {
  if (user) {
    command
      .addOption(new Option('--agent-password <password>', 'Password for the agent user').env('AGENT_PASSWORD'))
      .addOption(
        new Option('--agent-email <email>', 'Email for the agent user (default: <agent>@example.com)').env(
          ENV_AGENT_USER
        )
      )
      .option('--skip-user-creation', 'Do not create a dedicated agent user', false);
  }
  command
    .option('--acl-rules <rules>', 'ACL rule string for the agent')
    .addOption(
      new Option('--role-management <level>', 'Role management level').choices([...ROLE_MANAGEMENT_LEVELS])
    )
    .option('--database-filter <regex>', 'Only bind databases whose name matches this pattern')
    .option('--skip-existing', 'Leave databases that already carry the binding out of the tally', false)
    .option('--skip-all-databases', 'Only create identity resources; skip database bindings', false);
  if (force) {
    command.option('--force', 'Delete and recreate existing components', false);
  }
  return command;
}

/**
 * Print, then exit with the result's status
 */
function finish(result: CommandResult, ctx: CommandContext, printHuman = true): never {
  if (ctx.outputFormat === 'json' || printHuman) {
    printResult(result, ctx.outputFormat);
  }
  process.exit(result.success ? 0 : 1);
}

function fail(label: string, err: unknown): never {
  if (err instanceof PromptCancelledError) {
    info(err.message);
    process.exit(0);
  }
  error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

/**
 * Build the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('agent-provisioner')
    .description('Manage monitoring agent permissions on database clusters')
    .version(VERSION)
    // Global options available to all commands
    .addOption(new Option('--endpoint <url>', 'Cluster REST API endpoint, e.g. https://cluster:9443'))
    .addOption(new Option('--username <user>', 'Admin username').env(ENV_ADMIN_USER))
    .addOption(new Option('--password <password>', 'Admin password').env(ENV_ADMIN_PASSWORD))
    .addOption(new Option('--verify-ssl', 'Verify the cluster TLS certificate').default(false))
    .addOption(new Option('--agent-name <name>', 'Agent name (prefix for ACL and role)').env(ENV_AGENT_NAME))
    .addOption(new Option('--json', 'Output JSON for CI/automation').default(false))
    .addOption(new Option('-v, --verbose', 'Enable verbose logging').default(false));

  /**
   * create command - Provision a new agent
   */
  withProvisionOptions(
    program.command('create').description('Create ACL, role, user and database permissions for an agent')
  ).action(async (cmdOpts: ProvisionCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      const result = await createCommand(ctx, { ...toProvisionOptions(cmdOpts), force: cmdOpts.force });
      finish(result, ctx);
    } catch (err) {
      fail('Create', err);
    }
  });

  /**
   * update command - Re-apply database permissions
   */
  program
    .command('update')
    .description('Update database permissions for an existing agent')
    .option('--database-filter <regex>', 'Only bind databases whose name matches this pattern')
    .option('--skip-existing', 'Leave databases that already carry the binding out of the tally', false)
    .action(async (cmdOpts: UpdateCliOptions) => {
      const ctx = createContext(program.opts<GlobalOptions>());
      try {
        const result = await updateCommand(ctx, {
          databaseFilter: cmdOpts.databaseFilter,
          skipExisting: cmdOpts.skipExisting,
        });
        finish(result, ctx);
      } catch (err) {
        fail('Update', err);
      }
    });

  /**
   * repair command - Create missing components only
   */
  withProvisionOptions(
    program.command('repair').description('Create only the missing ACL, role or user for an agent'),
    { force: false }
  ).action(async (cmdOpts: ProvisionCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      const result = await repairCommand(ctx, toProvisionOptions(cmdOpts));
      finish(result, ctx);
    } catch (err) {
      fail('Repair', err);
    }
  });

  /**
   * provision command - Multi-cluster from YAML
   */
  withProvisionOptions(
    program
      .command('provision')
      .description('Provision the agent on every ENTERPRISE deployment in an agent YAML config')
      .requiredOption('--config <path>', 'Path to the agent YAML config file'),
    { user: false }
  )
    .addOption(new Option('--agent-password <password>', 'Password for agent users').env('AGENT_PASSWORD'))
    .addOption(new Option('--agent-email <email>', 'Email for agent users').env(ENV_AGENT_USER))
    .action(async (cmdOpts: ProvisionCliOptions & { config: string }) => {
      const ctx = createContext(program.opts<GlobalOptions>());
      try {
        const { skipUserCreation: _ignored, ...options } = toProvisionOptions(cmdOpts);
        const result = await provisionCommand(ctx, {
          ...options,
          force: cmdOpts.force,
          config: cmdOpts.config,
        });
        finish(result, ctx);
      } catch (err) {
        fail('Provision', err);
      }
    });

  /**
   * interactive command - Menu-driven mode
   */
  withProvisionOptions(
    program
      .command('interactive', { isDefault: true })
      .description('Choose between single and multi-cluster provisioning interactively'),
    { force: false }
  ).action(async (cmdOpts: ProvisionCliOptions) => {
    const ctx = createContext(program.opts<GlobalOptions>());
    try {
      const result = await interactiveCommand(ctx, toProvisionOptions(cmdOpts));
      // each round already printed its result
      finish(result, ctx, false);
    } catch (err) {
      fail('Interactive session', err);
    }
  });

  return program;
}

/**
 * Parse argv and run the selected command
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
