/**
 * Cluster administration API client
 *
 * Provides a typed interface to the REST API with:
 * - Basic auth on every request
 * - Optional TLS verification (skipped by default for lab clusters)
 * - ConflictError for HTTP 409, RequestError for every other failure
 * - Debug logging with credential redaction
 */

import fetch from 'node-fetch';
import { Agent as HttpsAgent } from 'node:https';
import type {
  Acl,
  Role,
  User,
  Database,
  PermissionBinding,
  PermissionUpdateResult,
  CreateAclRequest,
  CreateRoleRequest,
  CreateUserRequest,
  ClusterClientConfig,
  HttpMethod,
} from './types.js';
import { RequestError, ConflictError, CONFLICT_STATUS, errorMessage } from './errors.js';
import { ApiLogger, logger } from './logger.js';
import {
  expectList,
  expectOne,
  extractErrorDetail,
  isAcl,
  isDatabase,
  isRole,
  isUser,
} from './decode.js';

// =============================================================================
// Types
// =============================================================================

/**
 * ACLs sub-client (`/v1/redis_acls`)
 */
export interface AclsClient {
  list(): Promise<Acl[]>;
  create(request: CreateAclRequest): Promise<Acl>;
  delete(uid: number): Promise<void>;
}

/**
 * Roles sub-client (`/v1/roles`)
 */
export interface RolesClient {
  list(): Promise<Role[]>;
  create(request: CreateRoleRequest): Promise<Role>;
  delete(uid: number): Promise<void>;
}

/**
 * Users sub-client (`/v1/users`)
 */
export interface UsersClient {
  list(): Promise<User[]>;
  create(request: CreateUserRequest): Promise<User>;
  delete(uid: number): Promise<void>;
}

/**
 * Databases sub-client (`/v1/bdbs`)
 *
 * Databases are never created or deleted here; only their permission list is
 * replaced.
 */
export interface DatabasesClient {
  list(): Promise<Database[]>;
  /** Replace the permission list; never throws */
  updatePermissions(uid: number, bindings: PermissionBinding[]): Promise<PermissionUpdateResult>;
}

/**
 * Client for one cluster. Reconcilers depend on this interface only, so an
 * in-memory implementation can stand in for the remote API.
 */
export interface ClusterClient {
  readonly acls: AclsClient;
  readonly roles: RolesClient;
  readonly users: UsersClient;
  readonly databases: DatabasesClient;

  /** True only when `GET /v1/bdbs` answers 200; never throws */
  testConnectivity(): Promise<boolean>;

  /** Current configuration (without secrets) */
  getConfig(): { endpoint: string; username: string; verifySsl: boolean };
}

/**
 * Factory signature, injectable where clients are built per cluster
 */
export type ClusterClientFactory = (config: ClusterClientConfig) => ClusterClient;

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create an API client for one cluster endpoint
 *
 * @param config - Endpoint, admin credentials and TLS settings
 * @param log - Logger for request tracing (defaults to the shared logger)
 */
export function createClient(config: ClusterClientConfig, log: ApiLogger = logger): ClusterClient {
  const endpoint = config.endpoint.replace(/\/+$/, '');
  const verifySsl = config.verifySsl ?? false;
  const timeout = config.timeout ?? 30000;
  const httpLog = log.child({ endpoint });
  if (config.debug) {
    httpLog.setConfig({ level: 'debug' });
  }

  const httpsAgent = new HttpsAgent({ rejectUnauthorized: verifySsl });

  const defaultHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
    Authorization: `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`,
  };

  interface RawResponse {
    status: number;
    body: string;
  }

  /**
   * Send one request and return status and body text. Transport failures
   * become RequestError with status 0.
   */
  async function send(method: HttpMethod, path: string, body?: unknown): Promise<RawResponse> {
    const url = `${endpoint}/v1${path}`;
    httpLog.request(method, url, { headers: defaultHeaders, body });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = Date.now();

    try {
      const response = await fetch(url, {
        method,
        headers: defaultHeaders,
        body: body === undefined ? undefined : JSON.stringify(body),
        agent: (parsedUrl: URL) => (parsedUrl.protocol === 'https:' ? httpsAgent : undefined),
        signal: controller.signal,
      });
      const text = await response.text();
      httpLog.response(response.status, url, Date.now() - startTime);
      return { status: response.status, body: text };
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${timeout}ms` : errorMessage(error);
      throw new RequestError(`${method} ${path} failed: ${reason}`, {
        status: 0,
        method,
        url,
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Send a request and parse a 2xx JSON body; throw on any other status
   */
  async function request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const response = await send(method, path, body);
    const url = `${endpoint}/v1${path}`;

    if (response.status === CONFLICT_STATUS) {
      const detail = extractErrorDetail(response.body);
      throw new ConflictError(`${method} ${path} conflict (409)${detail ? `: ${detail}` : ''}`, {
        method,
        url,
        detail,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      const detail = extractErrorDetail(response.body);
      throw new RequestError(
        `${method} ${path} failed with status ${response.status}${detail ? `: ${detail}` : ''}`,
        { status: response.status, method, url, detail }
      );
    }

    if (!response.body) {
      return undefined;
    }

    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new RequestError(`${method} ${path} returned invalid JSON`, {
        status: response.status,
        method,
        url,
        detail: response.body.substring(0, 200),
        cause: error,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // ACLs Client
  // ---------------------------------------------------------------------------

  const acls: AclsClient = {
    async list(): Promise<Acl[]> {
      return expectList(await request('GET', '/redis_acls'), isAcl, 'ACL', httpLog);
    },

    async create(req: CreateAclRequest): Promise<Acl> {
      const created = await request('POST', '/redis_acls', { name: req.name, acl: req.acl });
      return expectOne(created, isAcl, 'ACL');
    },

    async delete(uid: number): Promise<void> {
      await request('DELETE', `/redis_acls/${uid}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Roles Client
  // ---------------------------------------------------------------------------

  const roles: RolesClient = {
    async list(): Promise<Role[]> {
      return expectList(await request('GET', '/roles'), isRole, 'role', httpLog);
    },

    async create(req: CreateRoleRequest): Promise<Role> {
      const created = await request('POST', '/roles', {
        name: req.name,
        management: req.management,
      });
      return expectOne(created, isRole, 'role');
    },

    async delete(uid: number): Promise<void> {
      await request('DELETE', `/roles/${uid}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Users Client
  // ---------------------------------------------------------------------------

  const users: UsersClient = {
    async list(): Promise<User[]> {
      return expectList(await request('GET', '/users'), isUser, 'user', httpLog);
    },

    async create(req: CreateUserRequest): Promise<User> {
      const created = await request('POST', '/users', {
        email: req.email,
        password: req.password,
        name: req.name,
        role_uids: req.role_uids,
      });
      return expectOne(created, isUser, 'user');
    },

    async delete(uid: number): Promise<void> {
      await request('DELETE', `/users/${uid}`);
    },
  };

  // ---------------------------------------------------------------------------
  // Databases Client
  // ---------------------------------------------------------------------------

  const databases: DatabasesClient = {
    async list(): Promise<Database[]> {
      return expectList(await request('GET', '/bdbs'), isDatabase, 'database', httpLog);
    },

    async updatePermissions(
      uid: number,
      bindings: PermissionBinding[]
    ): Promise<PermissionUpdateResult> {
      try {
        const response = await send('PUT', `/bdbs/${uid}`, { roles_permissions: bindings });
        if (response.status === 200) {
          return { ok: true };
        }
        return {
          ok: false,
          status: response.status,
          detail: `API Error: Status ${response.status}, Response: ${extractErrorDetail(response.body) ?? ''}`,
        };
      } catch (error) {
        return { ok: false, detail: `Request Error: ${errorMessage(error)}` };
      }
    },
  };

  // ---------------------------------------------------------------------------
  // Return Client
  // ---------------------------------------------------------------------------

  return {
    acls,
    roles,
    users,
    databases,

    async testConnectivity(): Promise<boolean> {
      try {
        const response = await send('GET', '/bdbs');
        return response.status === 200;
      } catch {
        return false;
      }
    },

    getConfig() {
      return { endpoint, username: config.username, verifySsl };
    },
  };
}
