/**
 * Round Robin
 *
 * FIFO ready queue with a fixed quantum. Jobs that arrive during a slice
 * join the tail before the preempted job is re-queued.
 */

import { zodErrorToSimulatorError } from '../../api/errors.js';
import { ROUND_ROBIN } from '../../config/defaults.js';
import type { Job } from '../../core/job.js';
import { computeMetrics } from '../../core/metrics.js';
import { RoundRobinOptionsSchema } from '../../types/schemas/engine.js';
import type { RoundRobinOptions, ScheduleResult } from '../../types/scheduling.js';
import { BaseScheduler, type SchedulerDependencies } from '../BaseScheduler.js';
import { sortByArrival } from '../selection.js';

export class RoundRobinScheduler extends BaseScheduler {
  public readonly name = 'Round Robin';
  public readonly options: RoundRobinOptions;

  constructor(options: Partial<RoundRobinOptions> = {}, dependencies: SchedulerDependencies = {}) {
    super(dependencies);

    const parsed = RoundRobinOptionsSchema.safeParse({
      timeQuantum: options.timeQuantum ?? ROUND_ROBIN.TIME_QUANTUM,
    });
    if (!parsed.success) {
      throw zodErrorToSimulatorError(parsed.error, 'Round Robin options');
    }
    this.options = parsed.data;
  }

  protected run(jobs: Job[]): ScheduleResult {
    const completed: Job[] = [];
    const waiting = sortByArrival(jobs);
    const readyQueue: Job[] = [];
    let currentTime = 0;

    const admitArrivals = (): void => {
      while (waiting.length > 0 && waiting[0].arrivalTime <= currentTime) {
        const arrived = waiting.shift();
        if (arrived) {
          readyQueue.push(arrived);
        }
      }
    };

    while (waiting.length > 0 || readyQueue.length > 0) {
      admitArrivals();

      const job = readyQueue.shift();
      if (!job) {
        const arrival = waiting[0].arrivalTime;
        this.idle(currentTime, arrival);
        currentTime = arrival;
        continue;
      }

      this.dispatch(job, currentTime);

      const slice = Math.min(this.options.timeQuantum, job.remainingTime);
      job.remainingTime -= slice;
      currentTime += slice;

      admitArrivals();

      if (job.remainingTime > 0) {
        readyQueue.push(job);
      } else {
        this.complete(job, currentTime, completed);
      }
    }

    return { completedJobs: completed, metrics: computeMetrics(completed) };
  }
}
