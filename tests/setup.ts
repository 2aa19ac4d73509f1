/**
 * Unit Test Setup
 *
 * Loaded by vitest before each test file.
 */

import { afterEach, vi } from 'vitest';

// The shared logger reads its level at import time; keep test output quiet.
process.env.AGENT_PROVISIONER_LOG_LEVEL = process.env.AGENT_PROVISIONER_LOG_LEVEL ?? 'error';

afterEach(() => {
  vi.restoreAllMocks();
});
