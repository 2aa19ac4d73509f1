/**
 * Vitest Configuration for agent-provisioner
 *
 * Unit tests run against an in-memory cluster fake; nothing touches the network.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Setup files run before tests
    setupFiles: ['./tests/setup.ts'],

    testTimeout: 10000,

    // Enable globals for describe, it, expect
    globals: true,

    environment: 'node',

    // Type checking
    typecheck: {
      enabled: false, // use tsc --noEmit separately
    },
  },
});
