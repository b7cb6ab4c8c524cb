#!/usr/bin/env node
/**
 * arxiv-digest binary entry point.
 * Environment validation and logger setup happen in the router so that
 * configuration errors surface as coded errors with their exit status.
 */

import { run } from './index';

async function main(): Promise<void> {
  const exitCode = await run(process.argv);
  process.exit(exitCode);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
