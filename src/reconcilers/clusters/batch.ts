/**
 * Multi-cluster provisioning
 *
 * Runs the create flow against each cluster in turn with failure
 * isolation: a cluster that fails is recorded and the batch moves on.
 */

import { stringify as stringifyYaml } from 'yaml';
import { createClient as createHttpClient } from '../../api/client.js';
import { errorMessage } from '../../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type { ClusterTarget } from '../../config/types.js';
import { AgentManager } from '../agents/manager.js';
import { ProvisioningError } from '../agents/types.js';
import type {
  BatchProvisionDeps,
  BatchProvisionRequest,
  BatchProvisionResult,
  ClusterOutcome,
} from './types.js';

/**
 * YAML snippet an operator can paste into the config so later runs reuse
 * the agent's credentials instead of prompting
 */
export function basicAuthSnippet(target: ClusterTarget, agentName: string): string {
  const url = new URL(target.endpoint);
  const deployment: Record<string, unknown> = {};
  if (target.id) deployment.id = target.id;
  deployment.name = target.name;
  deployment.type = 'ENTERPRISE';
  deployment.rest_api = { host: url.hostname, port: Number(url.port || 443) };
  deployment.credentials = {
    enterprise_api: { basic_auth: `${agentName}:\${AGENT_PASSWORD}` },
  };
  return stringifyYaml({ deployments: [deployment] });
}

function describeError(error: unknown): string {
  return error instanceof ProvisioningError ? error.toUserMessage() : errorMessage(error);
}

/**
 * Provision one cluster. Provisioning failures become a failed outcome;
 * prompter errors propagate.
 */
async function provisionCluster(
  target: ClusterTarget,
  request: BatchProvisionRequest,
  deps: BatchProvisionDeps,
  log: ApiLogger
): Promise<ClusterOutcome> {
  const reusedConfigCredentials = Boolean(target.username && target.password);
  const outcome: ClusterOutcome = {
    id: target.id,
    name: target.name,
    endpoint: target.endpoint,
    success: false,
    reusedConfigCredentials,
  };
  const { prompter } = deps;

  const username = target.username ?? (await prompter?.adminUsername(target));
  const password = target.password ?? (await prompter?.adminPassword(target));
  if (!username || !password) {
    outcome.error = 'Missing admin credentials for cluster';
    return outcome;
  }

  let agentPassword: string | undefined;
  if (reusedConfigCredentials) {
    log.info(`Using basic auth credentials for agent: ${username}`);
  } else {
    agentPassword = request.agentPassword ?? (await prompter?.agentPassword(target));
    if (!agentPassword) {
      outcome.error = `An agent password is required to create the user for '${request.agentName}'`;
      return outcome;
    }
    log.info(`Will create new user: ${request.agentName}`);
    log.warn(
      `No basic_auth found in config for deployment '${target.name}'. ` +
        `To avoid password prompts in future runs, add basic_auth to your YAML config:\n` +
        basicAuthSnippet(target, request.agentName)
    );
  }

  const factory = deps.createClient ?? ((config) => createHttpClient(config, log));
  const client = factory({
    endpoint: target.endpoint,
    username,
    password,
    verifySsl: request.verifySsl,
  });

  if (!(await client.testConnectivity())) {
    outcome.error = `Failed to connect to ${target.endpoint}`;
    return outcome;
  }

  try {
    const manager = new AgentManager(client, { logger: log, ...deps.managerOptions });
    outcome.result = await manager.create({
      ...request,
      agentPassword,
      skipUserCreation: reusedConfigCredentials,
    });
    outcome.success = true;
  } catch (error) {
    outcome.error = describeError(error);
  }
  return outcome;
}

/**
 * Provision the agent on every target, sequentially
 */
export async function provisionClusters(
  targets: ClusterTarget[],
  request: BatchProvisionRequest,
  deps: BatchProvisionDeps = {}
): Promise<BatchProvisionResult> {
  const baseLog = deps.logger ?? defaultLogger;
  const clusters: ClusterOutcome[] = [];

  for (const [index, target] of targets.entries()) {
    const log = baseLog.child({ cluster: target.name });
    log.info(`Cluster ${index + 1}/${targets.length}: ${target.name} (${target.endpoint})`);

    const outcome = await provisionCluster(target, request, deps, log);
    if (outcome.success) {
      log.info(`Cluster ${target.name} provisioned`);
    } else {
      log.error(`Cluster ${target.name} failed: ${outcome.error ?? 'unknown error'}`);
    }
    clusters.push(outcome);
    deps.onClusterComplete?.(outcome, index, targets.length);
  }

  const succeeded = clusters.filter((c) => c.success).length;
  const failed = clusters.length - succeeded;
  baseLog.info(
    `Multi-cluster provisioning completed: ${succeeded}/${clusters.length} clusters successful`
  );

  return {
    success: failed === 0,
    total: clusters.length,
    succeeded,
    failed,
    clusters,
  };
}
