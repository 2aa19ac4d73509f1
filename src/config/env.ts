/**
 * Environment variable fallbacks for CLI inputs
 *
 * Resolution order for each value: CLI flag, then environment variable(s).
 */

/** Admin username for the REST API */
export const ENV_ADMIN_USER = 'ADMIN_USER';
/** Admin password for the REST API */
export const ENV_ADMIN_PASSWORD = 'ADMIN_PWD';
export const ENV_AGENT_NAME = 'AGENT_NAME';
/** Agent password, checked in order */
export const ENV_AGENT_PASSWORD = ['AGENT_PASSWORD', 'AGENT_PWD'] as const;
/** Agent email; also offered as the username default in interactive mode */
export const ENV_AGENT_USER = 'AGENT_USER';

export const DEFAULT_AGENT_NAME = 'radar-agent';
export const DEFAULT_ADMIN_USERNAME = 'admin@example.com';
export const DEFAULT_ENDPOINT = 'https://localhost:9443';

type EnvSource = Record<string, string | undefined>;

/**
 * First non-empty value among the named variables
 */
export function readEnv(names: string | readonly string[], env: EnvSource = process.env): string | undefined {
  const list = typeof names === 'string' ? [names] : names;
  for (const name of list) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Agent password from AGENT_PASSWORD, then AGENT_PWD
 */
export function agentPasswordFromEnv(env: EnvSource = process.env): string | undefined {
  return readEnv(ENV_AGENT_PASSWORD, env);
}
