#!/usr/bin/env node
/**
 * agent-provisioner CLI entrypoint
 */

import { main } from './cli.js';

await main();
