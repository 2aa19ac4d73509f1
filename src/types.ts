/**
 * Shared types and interfaces for the agent-provisioner CLI
 */

import type { ClusterClientFactory } from './api/client.js';
import type { ApiLogger } from './api/logger.js';
import type { AgentManagerOptions } from './reconcilers/agents/types.js';
import type { Prompter } from './utils/prompt.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** REST API endpoint, e.g. https://cluster.example.com:9443 */
  endpoint?: string;
  /** Admin username */
  username?: string;
  /** Admin password */
  password?: string;
  /** Verify the cluster's TLS certificate */
  verifySsl: boolean;
  /** Name used for the agent's ACL, role and user */
  agentName?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result returned by every command
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  logger: ApiLogger;
  /** Builds the client for a cluster */
  createClient: ClusterClientFactory;
  /** Absent when input is not interactive */
  prompter?: Prompter;
  /** Overrides for retry policies and sleep */
  managerOptions?: AgentManagerOptions;
}
