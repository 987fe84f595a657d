#!/usr/bin/env node

/**
 * triz CLI entry point.
 */

import { runCli } from './run.js';

function main(): void {
  void runCli(process.argv.slice(2)).then((exitCode) => {
    process.exit(exitCode);
  });
}

main();
