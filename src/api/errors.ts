/**
 * Transport and HTTP errors raised by the cluster client
 */

import type { HttpMethod } from './types.js';

export const CONFLICT_STATUS = 409;

/**
 * Any failed API call: non-2xx response, timeout, DNS or TLS failure.
 * `status` is 0 when no HTTP response was received.
 */
export class RequestError extends Error {
  public readonly status: number;
  public readonly method: HttpMethod;
  public readonly url: string;
  public readonly detail?: string;

  constructor(
    message: string,
    options: {
      status: number;
      method: HttpMethod;
      url: string;
      detail?: string;
      cause?: unknown;
    }
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RequestError';
    this.status = options.status;
    this.method = options.method;
    this.url = options.url;
    this.detail = options.detail;
  }

  /**
   * True when the server answered at all
   */
  hasResponse(): boolean {
    return this.status > 0;
  }
}

/**
 * The API reported a resource name collision (HTTP 409)
 */
export class ConflictError extends RequestError {
  constructor(
    message: string,
    options: { method: HttpMethod; url: string; detail?: string }
  ) {
    super(message, { ...options, status: CONFLICT_STATUS });
    this.name = 'ConflictError';
  }
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

export function isRequestError(error: unknown): error is RequestError {
  return error instanceof RequestError;
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
