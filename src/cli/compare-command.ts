/**
 * `sched-compare` command
 *
 * Kept apart from the executable entry so it can be driven from tests with
 * an in-memory output sink.
 */

import { destination, pino } from 'pino';
import { ConfigurationError, toSimulatorError } from '../api/errors.js';
import { initializeConfig } from '../config/loader.js';
import { loadScenario, loadScenarios, loadWorkloadFile } from '../config/workloads.js';
import type { Job } from '../core/job.js';
import { compareSchedulers, defaultSchedulers, formatComparison } from '../reporting/compare.js';

export interface CLIArgs {
  _: string[];
  workload?: string;
  scenario?: string;
  config?: string;
  json: boolean;
  list: boolean;
  help: boolean;
}

export interface CommandOutput {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const VALUE_FLAGS = new Set(['workload', 'scenario', 'config']);
const BOOLEAN_FLAGS = new Set(['json', 'list', 'help']);

export function parseArgs(args: readonly string[]): CLIArgs {
  const result: CLIArgs = { _: [], json: false, list: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      result._.push(arg);
      continue;
    }

    const key = arg.slice(2);
    const nextArg = args[i + 1];

    if (VALUE_FLAGS.has(key)) {
      if (nextArg === undefined || nextArg.startsWith('--')) {
        throw new ConfigurationError(`Option --${key} requires a value`, { option: key });
      }
      i++;
      if (key === 'workload') result.workload = nextArg;
      else if (key === 'scenario') result.scenario = nextArg;
      else result.config = nextArg;
    } else if (BOOLEAN_FLAGS.has(key)) {
      if (key === 'json') result.json = true;
      else if (key === 'list') result.list = true;
      else result.help = true;
    } else {
      throw new ConfigurationError(`Unknown option: --${key}`, { option: key });
    }
  }

  return result;
}

export const HELP_TEXT = `
sched-compare - Compare CPU scheduling policies on one workload

USAGE:
  sched-compare --scenario <name> [options]
  sched-compare --workload <file> [options]
  sched-compare --list

OPTIONS:
  --scenario <name>    Run a named scenario from config/workloads.yaml
  --workload <file>    Run a YAML/JSON list of jobs
  --config <file>      Simulator configuration (default: config/simulator.yaml)
  --json               Print rows as JSON instead of a table
  --list               List named scenarios
  --help               Show this help
`;

/**
 * Run the command; returns the process exit code
 */
export function runCompare(argv: readonly string[], output: CommandOutput): number {
  try {
    const args = parseArgs(argv);

    if (args.help) {
      output.stdout(HELP_TEXT);
      return 0;
    }

    if (args.list) {
      for (const scenario of loadScenarios()) {
        output.stdout(`${scenario.name}\t${scenario.description ?? ''}`);
      }
      return 0;
    }

    let jobs: Job[];
    let title: string;
    if (args.workload) {
      jobs = loadWorkloadFile(args.workload);
      title = args.workload;
    } else if (args.scenario) {
      const scenario = loadScenario(args.scenario);
      jobs = scenario.jobs;
      title = scenario.description ?? scenario.name;
    } else {
      output.stderr('Either --scenario or --workload is required');
      output.stderr(HELP_TEXT);
      return 1;
    }

    const config = initializeConfig(args.config);
    const logger = pino({ level: config.logging.level }, destination(2));
    const rows = compareSchedulers(jobs, defaultSchedulers(config, { logger }));

    if (args.json) {
      output.stdout(JSON.stringify({ workload: title, results: rows }, null, 2));
    } else {
      output.stdout(`SCHEDULER COMPARISON: ${title}`);
      output.stdout(formatComparison(rows));
    }
    return 0;
  } catch (error) {
    output.stderr(JSON.stringify(toSimulatorError(error).toObject()));
    return 1;
  }
}
