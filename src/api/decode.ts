/**
 * Runtime narrowing of API response bodies
 */

import type { ApiLogger } from './logger.js';
import type { Acl, Database, PermissionBinding, Role, User } from './types.js';

export class DecodeError extends Error {
  constructor(message: string, public readonly value?: unknown) {
    super(message);
    this.name = 'DecodeError';
  }
}

type Guard<T> = (value: unknown) => value is T;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function isPermissionBinding(value: unknown): value is PermissionBinding {
  return (
    isObject(value) &&
    typeof value.role_uid === 'number' &&
    typeof value.redis_acl_uid === 'number'
  );
}

export function isAcl(value: unknown): value is Acl {
  return (
    isObject(value) &&
    typeof value.uid === 'number' &&
    typeof value.name === 'string' &&
    isOptionalString(value.acl)
  );
}

export function isRole(value: unknown): value is Role {
  return (
    isObject(value) &&
    typeof value.uid === 'number' &&
    typeof value.name === 'string' &&
    isOptionalString(value.management)
  );
}

export function isUser(value: unknown): value is User {
  return (
    isObject(value) &&
    typeof value.uid === 'number' &&
    typeof value.name === 'string' &&
    isOptionalString(value.email) &&
    (value.role_uids === undefined ||
      (Array.isArray(value.role_uids) && value.role_uids.every((uid) => typeof uid === 'number')))
  );
}

export function isDatabase(value: unknown): value is Database {
  return (
    isObject(value) &&
    typeof value.uid === 'number' &&
    typeof value.name === 'string' &&
    (value.roles_permissions === undefined ||
      (Array.isArray(value.roles_permissions) &&
        value.roles_permissions.every(isPermissionBinding)))
  );
}

/**
 * Narrow a single resource or throw
 */
export function expectOne<T>(value: unknown, guard: Guard<T>, kind: string): T {
  if (!guard(value)) {
    throw new DecodeError(`Unexpected ${kind} payload from API`, value);
  }
  return value;
}

/**
 * Narrow a list response. Entries without a numeric uid and a string name
 * are dropped with a warning.
 */
export function expectList<T>(
  value: unknown,
  guard: Guard<T>,
  kind: string,
  log?: ApiLogger
): T[] {
  if (!Array.isArray(value)) {
    throw new DecodeError(`Expected a ${kind} list from API`, value);
  }
  const items: T[] = [];
  value.forEach((entry: unknown, index) => {
    if (guard(entry)) {
      items.push(entry);
    } else {
      log?.warn(`Ignoring malformed ${kind} entry at index ${index}`, {
        uid: isObject(entry) ? entry.uid : undefined,
        name: isObject(entry) ? entry.name : undefined,
      });
    }
  });
  return items;
}

/**
 * Pull a human-readable message out of an error body
 */
export function extractErrorDetail(body: string): string | undefined {
  if (!body) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    if (isObject(parsed)) {
      for (const key of ['description', 'message', 'detail', 'error_code']) {
        const value = parsed[key];
        if (typeof value === 'string' && value.length > 0) {
          return value;
        }
      }
    }
  } catch {
    // not JSON; fall through to the raw excerpt
  }
  return body.substring(0, 200);
}
