#!/usr/bin/env npx tsx
/**
 * Entry point for `npm run cli`. See src/cli.ts for commands and flags.
 */

import { run } from '../src/cli';

process.exitCode = run(process.argv.slice(2));
