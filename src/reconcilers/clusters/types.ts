/**
 * Types for multi-cluster provisioning
 */

import type { ClusterClientFactory } from '../../api/client.js';
import type { ApiLogger } from '../../api/logger.js';
import type { ClusterTarget } from '../../config/types.js';
import type { AgentManagerOptions, CreateRequest, ProvisionResult } from '../agents/types.js';

/**
 * Supplies credentials the config file left out. Errors thrown here
 * (including a cancelled prompt) abort the whole batch.
 */
export interface CredentialPrompter {
  adminUsername(target: ClusterTarget): Promise<string>;
  adminPassword(target: ClusterTarget): Promise<string>;
  agentPassword(target: ClusterTarget): Promise<string>;
}

/**
 * The create request applied to every cluster. User creation is decided
 * per cluster from the credentials found in the config.
 */
export interface BatchProvisionRequest extends Omit<CreateRequest, 'skipUserCreation'> {
  verifySsl?: boolean;
}

export interface BatchProvisionDeps {
  /** Defaults to the HTTP client */
  createClient?: ClusterClientFactory;
  prompter?: CredentialPrompter;
  managerOptions?: AgentManagerOptions;
  logger?: ApiLogger;
  /** Called as each cluster finishes */
  onClusterComplete?: (outcome: ClusterOutcome, index: number, total: number) => void;
}

/**
 * Result for one cluster
 */
export interface ClusterOutcome {
  id?: string;
  name: string;
  endpoint: string;
  success: boolean;
  /** The config's basic_auth doubled as the agent's credentials */
  reusedConfigCredentials: boolean;
  result?: ProvisionResult;
  error?: string;
}

export interface BatchProvisionResult {
  /** True only when every cluster succeeded */
  success: boolean;
  total: number;
  succeeded: number;
  failed: number;
  clusters: ClusterOutcome[];
}
