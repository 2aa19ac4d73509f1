/**
 * In-memory cluster for reconciler tests
 *
 * Implements ClusterClient over plain arrays, with knobs for the failure
 * modes the reconciler has to handle: name conflicts, slow delete
 * propagation, failing lists, failing deletes and per-database update
 * failures. Every mutating call is recorded in `calls`.
 */

import type {
  AclsClient,
  ClusterClient,
  DatabasesClient,
  RolesClient,
  UsersClient,
} from '../../src/api/client.js';
import { ConflictError, RequestError } from '../../src/api/errors.js';
import { ApiLogger, type LogLevel } from '../../src/api/logger.js';
import type {
  Acl,
  Database,
  PermissionBinding,
  PermissionUpdateResult,
  Role,
  User,
} from '../../src/api/types.js';

type Kind = 'acl' | 'role' | 'user';

/** A deleted resource that listings still return for a while */
interface Ghost<T> {
  item: T;
  remaining: number;
}

interface ConflictScript {
  remaining: number;
  /** Runs when the last scripted conflict is thrown */
  onExhausted?: () => void;
}

export interface FakeClusterState {
  acls?: Acl[];
  roles?: Role[];
  users?: User[];
  databases?: Database[];
}

export class FakeCluster implements ClusterClient {
  readonly acls: AclsClient;
  readonly roles: RolesClient;
  readonly users: UsersClient;
  readonly databases: DatabasesClient;

  state: Required<FakeClusterState>;
  /** Mutating calls in order, e.g. "acls.create radar-agent-acl" */
  readonly calls: string[] = [];
  /** Bodies sent to updatePermissions, by database uid */
  readonly permissionUpdates: Array<{ uid: number; bindings: PermissionBinding[] }> = [];

  connected = true;
  /** List calls that keep returning a deleted resource */
  deleteLag = 0;
  readonly failingLists = new Set<Kind | 'database'>();
  readonly failingDeletes = new Set<Kind>();
  readonly failingDatabases = new Set<number>();

  private nextUid = 100;
  private readonly conflicts = new Map<Kind, ConflictScript>();
  private readonly aclGhosts: Ghost<Acl>[] = [];
  private readonly roleGhosts: Ghost<Role>[] = [];
  private readonly userGhosts: Ghost<User>[] = [];

  constructor(initial: FakeClusterState = {}) {
    this.state = {
      acls: initial.acls ?? [],
      roles: initial.roles ?? [],
      users: initial.users ?? [],
      databases: initial.databases ?? [],
    };

    this.acls = {
      list: async () => this.list('acl', this.state.acls, this.aclGhosts),
      create: async (req) => {
        this.calls.push(`acls.create ${req.name}`);
        this.maybeConflict('acl', '/redis_acls');
        const acl: Acl = { uid: this.uid(), name: req.name, acl: req.acl };
        this.state.acls.push(acl);
        return acl;
      },
      delete: async (uid) => {
        this.calls.push(`acls.delete ${uid}`);
        this.remove('acl', this.state.acls, this.aclGhosts, uid, `/redis_acls/${uid}`);
      },
    };

    this.roles = {
      list: async () => this.list('role', this.state.roles, this.roleGhosts),
      create: async (req) => {
        this.calls.push(`roles.create ${req.name}`);
        this.maybeConflict('role', '/roles');
        const role: Role = { uid: this.uid(), name: req.name, management: req.management };
        this.state.roles.push(role);
        return role;
      },
      delete: async (uid) => {
        this.calls.push(`roles.delete ${uid}`);
        this.remove('role', this.state.roles, this.roleGhosts, uid, `/roles/${uid}`);
      },
    };

    this.users = {
      list: async () => this.list('user', this.state.users, this.userGhosts),
      create: async (req) => {
        this.calls.push(`users.create ${req.name}`);
        this.maybeConflict('user', '/users');
        const user: User = {
          uid: this.uid(),
          name: req.name,
          email: req.email,
          role_uids: [...req.role_uids],
        };
        this.state.users.push(user);
        return user;
      },
      delete: async (uid) => {
        this.calls.push(`users.delete ${uid}`);
        this.remove('user', this.state.users, this.userGhosts, uid, `/users/${uid}`);
      },
    };

    this.databases = {
      list: async () => {
        if (this.failingLists.has('database')) {
          throw this.requestError('GET', '/bdbs', 503);
        }
        return this.state.databases.map((db) => ({
          ...db,
          roles_permissions: db.roles_permissions?.map((b) => ({ ...b })),
        }));
      },
      updatePermissions: async (uid, bindings): Promise<PermissionUpdateResult> => {
        this.calls.push(`databases.update ${uid}`);
        this.permissionUpdates.push({ uid, bindings: bindings.map((b) => ({ ...b })) });
        if (this.failingDatabases.has(uid)) {
          return { ok: false, status: 500, detail: 'API Error: Status 500, Response: internal error' };
        }
        const db = this.state.databases.find((d) => d.uid === uid);
        if (!db) {
          return { ok: false, status: 404, detail: 'API Error: Status 404, Response: not found' };
        }
        db.roles_permissions = bindings.map((b) => ({ ...b }));
        return { ok: true };
      },
    };
  }

  async testConnectivity(): Promise<boolean> {
    return this.connected;
  }

  getConfig() {
    return { endpoint: 'https://fake-cluster:9443', username: 'admin', verifySsl: false };
  }

  /**
   * Make the next `count` creates of `kind` fail with HTTP 409
   */
  scriptConflicts(kind: Kind, count: number, onExhausted?: () => void): void {
    this.conflicts.set(kind, { remaining: count, onExhausted });
  }

  /**
   * Insert a resource directly (not recorded in `calls`)
   */
  seedAcl(name: string, uid = this.uid()): Acl {
    const acl: Acl = { uid, name, acl: '+@read' };
    this.state.acls.push(acl);
    return acl;
  }

  seedRole(name: string, uid = this.uid()): Role {
    const role: Role = { uid, name, management: 'cluster_member' };
    this.state.roles.push(role);
    return role;
  }

  seedUser(name: string, email: string, roleUids: number[] = [], uid = this.uid()): User {
    const user: User = { uid, name, email, role_uids: roleUids };
    this.state.users.push(user);
    return user;
  }

  database(name: string): Database | undefined {
    return this.state.databases.find((db) => db.name === name);
  }

  private uid(): number {
    return this.nextUid++;
  }

  private requestError(method: 'GET' | 'DELETE', path: string, status: number): RequestError {
    return new RequestError(`${method} ${path} failed with status ${status}`, {
      status,
      method,
      url: `https://fake-cluster:9443/v1${path}`,
    });
  }

  private maybeConflict(kind: Kind, path: string): void {
    const script = this.conflicts.get(kind);
    if (!script || script.remaining <= 0) return;
    script.remaining--;
    if (script.remaining === 0) {
      script.onExhausted?.();
    }
    throw new ConflictError(`POST ${path} conflict (409)`, {
      method: 'POST',
      url: `https://fake-cluster:9443/v1${path}`,
    });
  }

  private list<T>(kind: Kind, items: T[], ghosts: Ghost<T>[]): T[] {
    if (this.failingLists.has(kind)) {
      throw this.requestError('GET', `/${kind}s`, 503);
    }
    const visible = [...items];
    for (const ghost of ghosts) {
      if (ghost.remaining > 0) {
        ghost.remaining--;
        visible.push(ghost.item);
      }
    }
    return visible;
  }

  private remove<T extends { uid: number }>(
    kind: Kind,
    items: T[],
    ghosts: Ghost<T>[],
    uid: number,
    path: string
  ): void {
    if (this.failingDeletes.has(kind)) {
      throw this.requestError('DELETE', path, 500);
    }
    const index = items.findIndex((item) => item.uid === uid);
    if (index < 0) {
      throw this.requestError('DELETE', path, 404);
    }
    const [removed] = items.splice(index, 1);
    if (this.deleteLag > 0) {
      ghosts.push({ item: removed, remaining: this.deleteLag });
    }
  }
}

/**
 * Logger that keeps formatted lines in memory
 */
export function createMemoryLogger(level: LogLevel = 'debug'): { logger: ApiLogger; lines: string[] } {
  const lines: string[] = [];
  const logger = new ApiLogger(
    { level, timestamps: false },
    {
      write(_level, line) {
        lines.push(line);
      },
    }
  );
  return { logger, lines };
}

/** Sleeper that records requested delays and returns immediately */
export function createRecordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
