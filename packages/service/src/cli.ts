#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   callbridge transform --source ringcentral --target zoom --job rc_zoom_sites --input sites.json
 */

import { runCli } from './commands.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
