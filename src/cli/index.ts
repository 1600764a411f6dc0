#!/usr/bin/env node
/**
 * policy-validator CLI - entry point.
 */

import { run } from './cli.js';

run().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
