#!/usr/bin/env node
/**
 * tunnelbot -- entry point.
 */

import { installSignalHandlers, run } from './cli.js';

installSignalHandlers();

run(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
