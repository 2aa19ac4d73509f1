/**
 * Configuration module exports
 */

export {
  loadClusterTargets,
  parseClusterTargets,
  interpolateEnv,
  isBareHost,
  deriveEndpointFromRedisUrl,
  DEFAULT_REST_API_PORT,
} from './deployments.js';

export {
  readEnv,
  agentPasswordFromEnv,
  ENV_ADMIN_USER,
  ENV_ADMIN_PASSWORD,
  ENV_AGENT_NAME,
  ENV_AGENT_PASSWORD,
  ENV_AGENT_USER,
  DEFAULT_AGENT_NAME,
  DEFAULT_ADMIN_USERNAME,
  DEFAULT_ENDPOINT,
} from './env.js';

export {
  ConfigError,
  type ClusterTarget,
  type ClusterTargetsResult,
  type RejectedDeployment,
  type ConfigErrorCode,
} from './types.js';
