/**
 * Library entry point
 *
 * The CLI lives in index.ts; this module exposes the client, config loader
 * and reconcilers for programmatic use.
 */

export * from './api/index.js';
export * from './config/index.js';
export * as reconcilers from './reconcilers/index.js';
