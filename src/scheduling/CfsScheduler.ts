/**
 * Completely Fair Scheduler (teaching analogue)
 *
 * Every ready job carries a virtual runtime: the CPU ticks it has received
 * since it became ready. The job with the lowest vruntime runs next, so CPU
 * time evens out across ready jobs.
 *
 * - A newcomer starts at the lowest vruntime currently in the ready set
 *   (0 if the set is empty) instead of at 0, so it competes with jobs that
 *   already ran without jumping ahead of all of them.
 * - Equal vruntimes go to the job that entered the ready set first.
 * - `minGranularity` is the shortest stretch a dispatched job keeps the CPU
 *   before selection runs again (1 = every tick).
 *
 * Unlike Linux CFS there are no weights/nice values and no red-black tree:
 * the ready set is a plain insertion-ordered array.
 */

import { zodErrorToSimulatorError } from '../api/errors.js';
import { CFS } from '../config/defaults.js';
import type { Job, JobId } from '../core/job.js';
import { computeMetrics } from '../core/metrics.js';
import { CfsOptionsSchema } from '../types/schemas/engine.js';
import type { CfsOptions, ScheduleResult } from '../types/scheduling.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { BaseScheduler, type SchedulerDependencies } from './BaseScheduler.js';
import { removeItem, selectMin, sortByArrival } from './selection.js';

export class CfsScheduler extends BaseScheduler {
  public readonly name = 'CFS';
  public readonly options: CfsOptions;

  constructor(options: Partial<CfsOptions> = {}, dependencies: SchedulerDependencies = {}) {
    super(dependencies);

    const parsed = CfsOptionsSchema.safeParse({
      minGranularity: options.minGranularity ?? CFS.MIN_GRANULARITY,
    });
    if (!parsed.success) {
      throw zodErrorToSimulatorError(parsed.error, 'CFS options');
    }
    this.options = parsed.data;
  }

  protected run(jobs: Job[]): ScheduleResult {
    const waiting = sortByArrival(jobs);
    const ready: Job[] = [];
    const vruntime = new Map<JobId, number>();
    const completed: Job[] = [];

    let current: Job | undefined;
    let sliceUsed = 0;
    let currentTime = 0;

    const minVruntime = (): number => {
      const lowest = selectMin(ready, (job) => vruntime.get(job.jobId) ?? 0);
      return lowest ? (vruntime.get(lowest.jobId) ?? 0) : 0;
    };

    const admitArrivals = (): void => {
      while (waiting.length > 0 && waiting[0].arrivalTime <= currentTime) {
        const job = waiting.shift();
        if (job) {
          const initial = minVruntime();
          vruntime.set(job.jobId, initial);
          ready.push(job);
          lazyLog(
            this.logger,
            'trace',
            () => ({ time: currentTime, jobId: job.jobId, vruntime: initial }),
            'Job arrived'
          );
        }
      }
    };

    while (waiting.length > 0 || ready.length > 0) {
      admitArrivals();

      if (ready.length === 0) {
        const arrival = waiting[0].arrivalTime;
        this.idle(currentTime, arrival);
        currentTime = arrival;
        continue;
      }

      // Keep the current job until it has had its minimum slice
      if (!current || sliceUsed >= this.options.minGranularity) {
        const next = selectMin(ready, (job) => vruntime.get(job.jobId) ?? 0);
        if (next !== current) {
          sliceUsed = 0;
        }
        current = next;
      }
      if (!current) {
        break;
      }

      const job = current;
      if (sliceUsed === 0) {
        this.dispatch(job, currentTime);
      }

      job.remainingTime -= 1;
      currentTime += 1;
      sliceUsed += 1;
      vruntime.set(job.jobId, (vruntime.get(job.jobId) ?? 0) + 1);

      // Arrivals during the tick see the running job's updated vruntime
      admitArrivals();

      if (job.remainingTime === 0) {
        removeItem(ready, job);
        vruntime.delete(job.jobId);
        this.complete(job, currentTime, completed);
        current = undefined;
        sliceUsed = 0;
      }
    }

    return { completedJobs: completed, metrics: computeMetrics(completed) };
  }
}
