#!/usr/bin/env node

/**
 * Scheduling policy comparison CLI
 *
 * Usage:
 *   sched-compare --scenario staggered
 *   sched-compare --workload jobs.yaml --json
 */

import { runCompare } from './compare-command.js';

process.exitCode = runCompare(process.argv.slice(2), {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
});
