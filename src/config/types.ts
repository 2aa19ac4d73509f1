/**
 * Configuration types for multi-cluster provisioning
 */

/**
 * One cluster to provision, resolved from a deployment entry
 */
export interface ClusterTarget {
  /** Deployment id from the config file */
  id?: string;
  /** Display name (falls back to the id, then the endpoint) */
  name: string;
  /** REST API base URL, e.g. https://cluster.example.com:9443 */
  endpoint: string;
  /** Admin username from basic_auth; prompted when absent */
  username?: string;
  /** Admin password from basic_auth; prompted when absent */
  password?: string;
}

/**
 * A deployment entry that could not be turned into a target
 */
export interface RejectedDeployment {
  id?: string;
  name: string;
  reason: string;
}

/**
 * Result of loading a deployments file
 */
export interface ClusterTargetsResult {
  targets: ClusterTarget[];
  rejected: RejectedDeployment[];
  /** Unresolved `${VAR}` placeholders and similar non-fatal findings */
  warnings: string[];
}

export type ConfigErrorCode = 'CONFIG_NOT_FOUND' | 'CONFIG_PARSE_ERROR' | 'NO_DEPLOYMENTS';

/**
 * Error raised when a deployments file cannot be used at all
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
