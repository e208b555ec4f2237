/**
 * Base class for policy engines
 *
 * Owns what every policy shares: the per-run deep copy of the workload,
 * workload validation, dispatch/completion bookkeeping, events and the
 * end-of-run summary log. Subclasses keep all queue state local to `run`,
 * so one engine instance can be reused and runs never share job objects.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { ConfigurationError } from '../api/errors.js';
import type { Job, JobId } from '../core/job.js';
import type {
  ScheduleResult,
  Scheduler,
  SchedulerEvents,
  SchedulingMetrics,
} from '../types/scheduling.js';
import { lazyLog, makespan } from '../utils/logger-helpers.js';

/**
 * Optional collaborators (test hooks, shared logger)
 */
export interface SchedulerDependencies {
  logger?: Logger;
}

export abstract class BaseScheduler<M extends SchedulingMetrics = SchedulingMetrics>
  extends EventEmitter<SchedulerEvents>
  implements Scheduler<M>
{
  public abstract readonly name: string;
  protected readonly logger?: Logger;

  constructor(dependencies: SchedulerDependencies = {}) {
    super();
    this.logger = dependencies.logger;
  }

  /**
   * Run the policy to exhaustion on a private copy of `jobs`
   *
   * @throws ConfigurationError when two jobs share an id
   * @throws MetricsError when the workload is empty
   */
  public schedule(jobs: readonly Job[]): ScheduleResult<M> {
    const workload = this.copyWorkload(jobs);

    this.logger?.debug({ policy: this.name, jobs: workload.length }, 'Simulation started');

    const result = this.run(workload);

    lazyLog(
      this.logger,
      'info',
      () => ({
        policy: this.name,
        jobs: result.completedJobs.length,
        avgTurnaround: result.metrics.avgTurnaround,
        avgResponse: result.metrics.avgResponse,
        makespan: makespan(result.completedJobs),
      }),
      'Simulation complete'
    );

    return result;
  }

  /**
   * Policy-specific tick loop over an already copied workload
   */
  protected abstract run(jobs: Job[]): ScheduleResult<M>;

  /**
   * Record a dispatch; sets `startTime` on the first one
   */
  protected dispatch(job: Job, time: number, priority?: number): void {
    const firstRun = job.startTime === undefined;
    if (firstRun) {
      job.startTime = time;
    }

    lazyLog(
      this.logger,
      'debug',
      () => ({ policy: this.name, time, jobId: job.jobId, priority, remaining: job.remainingTime }),
      'Dispatch'
    );
    this.emit('dispatch', { time, jobId: job.jobId, priority, firstRun });
  }

  /**
   * Record completion and move the job into `completed`
   */
  protected complete(job: Job, time: number, completed: Job[]): void {
    job.completionTime = time;
    completed.push(job);

    lazyLog(
      this.logger,
      'debug',
      () => ({
        policy: this.name,
        time,
        jobId: job.jobId,
        turnaround: time - job.arrivalTime,
      }),
      'Job completed'
    );
    this.emit('complete', job, time);
  }

  /**
   * Record an idle gap that the clock skips over
   */
  protected idle(from: number, to: number): void {
    lazyLog(this.logger, 'trace', () => ({ policy: this.name, from, to }), 'CPU idle');
    this.emit('idle', from, to);
  }

  private copyWorkload(jobs: readonly Job[]): Job[] {
    const seen = new Set<JobId>();
    for (const job of jobs) {
      if (seen.has(job.jobId)) {
        throw new ConfigurationError(`Duplicate job id: ${String(job.jobId)}`, { jobId: job.jobId });
      }
      seen.add(job.jobId);
    }

    return jobs.map((job) => job.clone());
  }
}
