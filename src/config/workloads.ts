/**
 * Workload loading
 *
 * Workloads are YAML (or JSON, which js-yaml also reads) lists of job
 * specifications. Named scenarios live in config/workloads.yaml.
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, zodErrorToSimulatorError } from '../api/errors.js';
import { Job, createJobs } from '../core/job.js';
import { JobSpecSchema, WorkloadSchema } from '../types/schemas/job.js';
import { packageConfigPath } from './loader.js';

const ScenarioFileSchema = z.record(
  z.object({
    description: z.string().optional(),
    jobs: z.array(JobSpecSchema).min(1, 'A scenario needs at least one job'),
  })
);

export interface Scenario {
  name: string;
  description?: string;
  jobs: Job[];
}

function readDocument(path: string): unknown {
  try {
    return yaml.load(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read workload file ${path}: ${reason}`, { path });
  }
}

/**
 * Parse a workload document already loaded into memory
 */
export function parseWorkload(document: unknown): Job[] {
  const result = WorkloadSchema.safeParse(document);
  if (!result.success) {
    throw zodErrorToSimulatorError(result.error, 'Workload');
  }
  return createJobs(result.data);
}

/**
 * Load a workload file (bare list of jobs or `{ jobs: [...] }`)
 */
export function loadWorkloadFile(path: string): Job[] {
  return parseWorkload(readDocument(path));
}

/**
 * Load every named scenario from a scenario file
 */
export function loadScenarios(path = packageConfigPath('workloads.yaml')): Scenario[] {
  const result = ScenarioFileSchema.safeParse(readDocument(path));
  if (!result.success) {
    throw zodErrorToSimulatorError(result.error, `Scenario file ${path}`);
  }

  return Object.entries(result.data).map(([name, scenario]) => ({
    name,
    description: scenario.description,
    jobs: createJobs(scenario.jobs),
  }));
}

/**
 * Load one named scenario
 *
 * @throws ConfigurationError when no scenario has that name
 */
export function loadScenario(name: string, path?: string): Scenario {
  const scenarios = loadScenarios(path);
  const scenario = scenarios.find((candidate) => candidate.name === name);
  if (!scenario) {
    throw new ConfigurationError(`Unknown scenario: ${name}`, {
      available: scenarios.map((candidate) => candidate.name),
    });
  }
  return scenario;
}
