/**
 * Unit Tests: Deployments Config
 *
 * Tests turning an agent YAML config into cluster targets:
 * - Endpoint from rest_api or derived from redis_urls
 * - basic_auth credentials and env interpolation
 * - Rejected deployments and load errors
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  agentPasswordFromEnv,
  ConfigError,
  deriveEndpointFromRedisUrl,
  interpolateEnv,
  isBareHost,
  loadClusterTargets,
  parseClusterTargets,
  readEnv,
} from '../../src/config/index.js';

// =============================================================================
// Endpoint Derivation
// =============================================================================

describe('deriveEndpointFromRedisUrl', () => {
  it('drops the database label and uses the REST API port', () => {
    expect(deriveEndpointFromRedisUrl('redis://redis-12000.cluster.example.com:12000')).toBe(
      'https://cluster.example.com:9443'
    );
  });

  it('keeps a host whose first label is not a database label', () => {
    expect(deriveEndpointFromRedisUrl('redis://redis-enterprise.example.com:12000', 8443)).toBe(
      'https://redis-enterprise.example.com:8443'
    );
  });

  it('keeps a single-label host', () => {
    expect(deriveEndpointFromRedisUrl('redis://redis-12000:12000')).toBe('https://redis-12000:9443');
  });

  it('returns undefined for an unparseable URL', () => {
    expect(deriveEndpointFromRedisUrl('not a url')).toBeUndefined();
  });
});

describe('isBareHost', () => {
  it('rejects schemes and ports', () => {
    expect(isBareHost('cluster.example.com')).toBe(true);
    expect(isBareHost('https://cluster.example.com')).toBe(false);
    expect(isBareHost('cluster.example.com:9443')).toBe(false);
  });
});

describe('interpolateEnv', () => {
  it('replaces set variables and keeps unset ones with a warning', () => {
    const warnings: string[] = [];

    const result = interpolateEnv(
      { auth: '${ADMIN_USER}:${ADMIN_PWD}', ports: [9443] },
      { ADMIN_USER: 'admin' },
      warnings
    );

    expect(result).toEqual({ auth: 'admin:${ADMIN_PWD}', ports: [9443] });
    expect(warnings).toEqual(["Environment variable 'ADMIN_PWD' is not set; keeping ${ADMIN_PWD}"]);
  });
});

// =============================================================================
// parseClusterTargets
// =============================================================================

describe('parseClusterTargets', () => {
  const yaml = `
deployments:
  - id: re-prod
    name: Production
    type: ENTERPRISE
    rest_api:
      host: cluster.example.com
      port: 9443
    credentials:
      enterprise_api:
        basic_auth: "\${ADMIN_USER}:\${ADMIN_PWD}"
  - id: re-lab
    type: enterprise
    redis_urls:
      - redis://redis-12000.lab.example.com:12000
  - name: Cache
    type: OSS
    redis_url: redis://cache.example.com:6379
`;

  it('keeps ENTERPRISE deployments and resolves their endpoints', () => {
    const result = parseClusterTargets(yaml, { ADMIN_USER: 'admin@example.com', ADMIN_PWD: 'test-secret' });

    expect(result.targets).toEqual([
      {
        id: 're-prod',
        name: 'Production',
        endpoint: 'https://cluster.example.com:9443',
        username: 'admin@example.com',
        password: 'test-secret',
      },
      { id: 're-lab', name: 're-lab', endpoint: 'https://lab.example.com:9443' },
    ]);
    expect(result.rejected).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('reads rest_api basic_auth and splits on the first colon only', () => {
    const result = parseClusterTargets(
      `deployments:
  - name: a
    type: ENTERPRISE
    rest_api: { host: a.example.com, port: 9443 }
    credentials: { rest_api: { basic_auth: "radar-agent:pa:ss" } }
`,
      {}
    );

    expect(result.targets[0]).toMatchObject({ username: 'radar-agent', password: 'pa:ss' });
  });

  it('rejects a host with a scheme and basic_auth without a colon', () => {
    const result = parseClusterTargets(
      `deployment:
  - name: bad-host
    type: ENTERPRISE
    rest_api: { host: "https://a.example.com", port: 9443 }
  - name: bad-auth
    type: ENTERPRISE
    rest_api: { host: b.example.com, port: 9443 }
    credentials: { enterprise_api: { basic_auth: "nocolon" } }
  - name: no-endpoint
    type: ENTERPRISE
`,
      {}
    );

    expect(result.targets).toEqual([]);
    expect(result.rejected).toEqual([
      {
        id: undefined,
        name: 'bad-host',
        reason:
          "Invalid host format 'https://a.example.com': host should not contain http://, https://, :// or :port",
      },
      { id: undefined, name: 'bad-auth', reason: 'Invalid basic_auth format; expected "user:password"' },
      {
        id: undefined,
        name: 'no-endpoint',
        reason: 'No rest_api host/port and no redis_urls to derive the endpoint from',
      },
    ]);
  });

  it('fails when no deployment is ENTERPRISE', () => {
    const run = () => parseClusterTargets('deployments:\n  - name: c\n    type: OSS\n', {});
    expect(run).toThrow(ConfigError);
    expect(run).toThrow('No ENTERPRISE deployments found in config');
  });

  it('fails on invalid YAML', () => {
    try {
      parseClusterTargets('deployments: [unclosed', {});
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('CONFIG_PARSE_ERROR');
      }
    }
  });
});

// =============================================================================
// loadClusterTargets
// =============================================================================

describe('loadClusterTargets', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads the file from disk', () => {
    dir = mkdtempSync(join(tmpdir(), 'agent-provisioner-'));
    const path = join(dir, 'agent.yaml');
    writeFileSync(
      path,
      'deployments:\n  - name: lab\n    type: ENTERPRISE\n    rest_api: { host: lab.example.com, port: 9443 }\n'
    );

    expect(loadClusterTargets(path, {}).targets).toEqual([
      { id: undefined, name: 'lab', endpoint: 'https://lab.example.com:9443' },
    ]);
  });

  it('reports a missing file', () => {
    expect(() => loadClusterTargets('/nonexistent/agent.yaml', {})).toThrow(
      'Config file not found: /nonexistent/agent.yaml'
    );
  });
});

// =============================================================================
// Environment
// =============================================================================

describe('env fallbacks', () => {
  it('takes the first non-empty variable', () => {
    expect(agentPasswordFromEnv({ AGENT_PASSWORD: '', AGENT_PWD: 'test-secret' })).toBe('test-secret');
    expect(readEnv('ADMIN_USER', {})).toBeUndefined();
  });
});
