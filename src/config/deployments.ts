/**
 * Deployments file loader
 *
 * Reads an agent YAML config, interpolates `${VAR}` placeholders from the
 * environment and turns each ENTERPRISE deployment into a ClusterTarget.
 *
 * Accepted shape (only the fields read here):
 *
 *   deployments:
 *     - id: "re-prod"
 *       name: "Production"
 *       type: "ENTERPRISE"
 *       redis_urls: ["redis://redis-12000.cluster.example.com:12000"]
 *       rest_api: { host: "cluster.example.com", port: 9443 }
 *       credentials:
 *         enterprise_api: { basic_auth: "${ADMIN_USER}:${ADMIN_PASSWORD}" }
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type {
  ClusterTarget,
  ClusterTargetsResult,
  RejectedDeployment,
} from './types.js';
import { ConfigError } from './types.js';

export const DEFAULT_REST_API_PORT = 9443;

const ENV_PLACEHOLDER = /\$\{([^}]+)\}/g;

/** Leading hostname label of a database endpoint, e.g. `redis-12000` */
const DATABASE_LABEL = /^redis-\d+$/;

type EnvSource = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

// =============================================================================
// Interpolation
// =============================================================================

/**
 * Replace `${VAR}` in every string of a parsed document. Unset variables are
 * left verbatim and reported in `warnings`.
 */
export function interpolateEnv(value: unknown, env: EnvSource, warnings: string[]): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (placeholder: string, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        warnings.push(`Environment variable '${name}' is not set; keeping ${placeholder}`);
        return placeholder;
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnv(item, env, warnings));
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateEnv(entry, env, warnings);
    }
    return result;
  }
  return value;
}

// =============================================================================
// Endpoint Derivation
// =============================================================================

/**
 * A REST API host must be a bare hostname
 */
export function isBareHost(host: string): boolean {
  return !['http://', 'https://', '://', ':'].some((token) => host.includes(token));
}

/**
 * Derive the REST API endpoint from a database URL by dropping the
 * `redis-<port>` label and switching to the REST API port
 *
 * @example
 * deriveEndpointFromRedisUrl('redis://redis-12000.cluster.example.com:12000')
 * // 'https://cluster.example.com:9443'
 */
export function deriveEndpointFromRedisUrl(
  redisUrl: string,
  port: string | number = DEFAULT_REST_API_PORT
): string | undefined {
  let hostname: string;
  try {
    hostname = new URL(redisUrl).hostname;
  } catch {
    return undefined;
  }
  if (!hostname) return undefined;

  const labels = hostname.split('.');
  if (labels.length > 1 && DATABASE_LABEL.test(labels[0])) {
    hostname = labels.slice(1).join('.');
  }
  return `https://${hostname}:${port}`;
}

type EndpointResolution = { endpoint: string } | { reason: string };

function resolveEndpoint(deployment: Record<string, unknown>): EndpointResolution {
  const restApi = asRecord(deployment.rest_api);
  const host = asString(restApi.host);
  const port = asString(restApi.port);

  if (host !== undefined && port !== undefined) {
    if (!isBareHost(host)) {
      return {
        reason: `Invalid host format '${host}': host should not contain http://, https://, :// or :port`,
      };
    }
    return { endpoint: `https://${host}:${port}` };
  }

  const urls = deployment.redis_urls ?? deployment.redis_url;
  const first = Array.isArray(urls) ? asString(urls[0]) : asString(urls);
  if (!first) {
    return { reason: 'No rest_api host/port and no redis_urls to derive the endpoint from' };
  }

  const endpoint = deriveEndpointFromRedisUrl(first, port ?? DEFAULT_REST_API_PORT);
  return endpoint ? { endpoint } : { reason: `Could not parse redis_url '${first}'` };
}

// =============================================================================
// Credentials
// =============================================================================

type CredentialResolution =
  | { username?: string; password?: string }
  | { reason: string };

function resolveCredentials(deployment: Record<string, unknown>): CredentialResolution {
  const credentials = asRecord(deployment.credentials);
  const basicAuth =
    asString(asRecord(credentials.enterprise_api).basic_auth) ??
    asString(asRecord(credentials.rest_api).basic_auth);

  if (!basicAuth) {
    return {};
  }
  const separator = basicAuth.indexOf(':');
  if (separator < 0) {
    return { reason: 'Invalid basic_auth format; expected "user:password"' };
  }
  return {
    username: basicAuth.slice(0, separator) || undefined,
    password: basicAuth.slice(separator + 1) || undefined,
  };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Extract cluster targets from YAML text
 *
 * @throws ConfigError when the text does not parse or holds no ENTERPRISE deployment
 */
export function parseClusterTargets(
  text: string,
  env: EnvSource = process.env
): ClusterTargetsResult {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse config: ${error instanceof Error ? error.message : String(error)}`,
      'CONFIG_PARSE_ERROR'
    );
  }

  const warnings: string[] = [];
  const root = asRecord(interpolateEnv(document, env, warnings));
  const entries = root.deployments ?? root.deployment;
  const deployments = (Array.isArray(entries) ? entries : []).filter(isRecord);
  const enterprise = deployments.filter(
    (d) => asString(d.type)?.toUpperCase() === 'ENTERPRISE'
  );

  if (enterprise.length === 0) {
    throw new ConfigError('No ENTERPRISE deployments found in config', 'NO_DEPLOYMENTS', {
      deployments: deployments.length,
    });
  }

  const targets: ClusterTarget[] = [];
  const rejected: RejectedDeployment[] = [];

  for (const deployment of enterprise) {
    const id = asString(deployment.id);
    const label = asString(deployment.name) ?? id;

    const endpoint = resolveEndpoint(deployment);
    if ('reason' in endpoint) {
      rejected.push({ id, name: label ?? 'unknown', reason: endpoint.reason });
      continue;
    }
    const credentials = resolveCredentials(deployment);
    if ('reason' in credentials) {
      rejected.push({ id, name: label ?? endpoint.endpoint, reason: credentials.reason });
      continue;
    }

    targets.push({
      id,
      name: label ?? endpoint.endpoint,
      endpoint: endpoint.endpoint,
      ...credentials,
    });
  }

  return { targets, rejected, warnings };
}

/**
 * Load cluster targets from a YAML file
 *
 * @throws ConfigError with CONFIG_NOT_FOUND when the file is missing
 */
export function loadClusterTargets(
  path: string,
  env: EnvSource = process.env
): ClusterTargetsResult {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Config file not found: ${path}`, 'CONFIG_NOT_FOUND', { path: fullPath });
  }

  let text: string;
  try {
    text = readFileSync(fullPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Failed to read config: ${error instanceof Error ? error.message : String(error)}`,
      'CONFIG_PARSE_ERROR',
      { path: fullPath }
    );
  }
  return parseClusterTargets(text, env);
}
