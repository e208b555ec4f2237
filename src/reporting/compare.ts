/**
 * Policy comparison harness
 *
 * Runs several engines on the same workload and collects the headline
 * numbers. Engines copy the workload themselves, so the same Job objects
 * are handed to every engine.
 */

import type { SimulatorConfig } from '../config/loader.js';
import { getConfig } from '../config/loader.js';
import type { Job, JobId } from '../core/job.js';
import type { SchedulerDependencies } from '../scheduling/BaseScheduler.js';
import { createScheduler } from '../scheduling/factory.js';
import type { Scheduler } from '../types/scheduling.js';
import { jainsFairnessIndex } from './fairness.js';

export interface ComparisonRow {
  name: string;
  avgTurnaround: number;
  avgResponse: number;
  /**
   * Jain's index over per-job turnaround times
   */
  turnaroundFairness: number;
  /**
   * Jain's index over per-job response times
   */
  responseFairness: number;
  completionOrder: JobId[];
}

/**
 * Engines listed under `comparison.policies`, in that order
 */
export function defaultSchedulers(
  config: SimulatorConfig = getConfig(),
  dependencies: SchedulerDependencies = {}
): Scheduler[] {
  return config.comparison.policies.map((policy) => createScheduler(policy, config, dependencies));
}

export function compareSchedulers(
  jobs: readonly Job[],
  schedulers: readonly Scheduler[] = defaultSchedulers()
): ComparisonRow[] {
  return schedulers.map((scheduler) => {
    const { completedJobs, metrics } = scheduler.schedule(jobs);
    return {
      name: scheduler.name,
      avgTurnaround: metrics.avgTurnaround,
      avgResponse: metrics.avgResponse,
      turnaroundFairness: jainsFairnessIndex(metrics.turnaroundTimes),
      responseFairness: jainsFairnessIndex(metrics.responseTimes),
      completionOrder: completedJobs.map((job) => job.jobId),
    };
  });
}

/**
 * Fixed-width text table, one line per engine
 */
export function formatComparison(rows: readonly ComparisonRow[]): string {
  const header = ['Policy', 'Avg Turnaround', 'Avg Response', 'Jain (TAT)', 'Jain (Resp)'];
  const body = rows.map((row) => [
    row.name,
    row.avgTurnaround.toFixed(2),
    row.avgResponse.toFixed(2),
    row.turnaroundFairness.toFixed(4),
    row.responseFairness.toFixed(4),
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...body.map((cells) => cells[column].length))
  );
  const renderLine = (cells: string[]): string =>
    cells
      .map((cell, column) => (column === 0 ? cell.padEnd(widths[column]) : cell.padStart(widths[column])))
      .join('  ');

  const separator = widths.map((width) => '-'.repeat(width)).join('  ');
  return [renderLine(header), separator, ...body.map(renderLine)].join('\n');
}
