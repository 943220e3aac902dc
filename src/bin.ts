#!/usr/bin/env node

/**
 * Minion Forge - CLI entry point
 */

import { run } from './cli.js';

process.on('unhandledRejection', (reason) => {
  console.error('[FATAL] Unhandled Rejection:', reason);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught Exception:', error);
  process.exit(1);
});

run().catch((error: unknown) => {
  console.error('[FATAL] Failed to run minion:', error);
  process.exit(1);
});
