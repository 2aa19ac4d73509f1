/**
 * Multi-cluster provisioning
 */

export { provisionClusters, basicAuthSnippet } from './batch.js';
export type {
  CredentialPrompter,
  BatchProvisionRequest,
  BatchProvisionDeps,
  ClusterOutcome,
  BatchProvisionResult,
} from './types.js';
