/**
 * Reconcilers module - converge cluster state for agents
 *
 * @module reconcilers
 */

export * as agents from './agents/index.js';
export * as permissions from './permissions/index.js';
export * as clusters from './clusters/index.js';
