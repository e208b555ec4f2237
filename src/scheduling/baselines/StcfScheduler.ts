/**
 * Shortest Time-to-Completion First (preemptive SJF)
 *
 * Re-evaluated every tick, so a newly arrived shorter job takes the CPU
 * at its arrival tick.
 */

import type { Job } from '../../core/job.js';
import { computeMetrics } from '../../core/metrics.js';
import type { ScheduleResult } from '../../types/scheduling.js';
import { BaseScheduler } from '../BaseScheduler.js';
import { nextArrival, removeItem, selectMin } from '../selection.js';

export class StcfScheduler extends BaseScheduler {
  public readonly name = 'STCF';

  protected run(jobs: Job[]): ScheduleResult {
    const completed: Job[] = [];
    const remaining = [...jobs];
    let current: Job | undefined;
    let currentTime = 0;

    while (remaining.length > 0) {
      const available = remaining.filter((job) => job.arrivalTime <= currentTime);
      const job = selectMin(available, (candidate) => candidate.remainingTime);

      if (!job) {
        const arrival = nextArrival(remaining) ?? currentTime;
        this.idle(currentTime, arrival);
        currentTime = arrival;
        current = undefined;
        continue;
      }

      if (job !== current) {
        this.dispatch(job, currentTime);
        current = job;
      }

      job.remainingTime -= 1;
      currentTime += 1;

      if (job.remainingTime === 0) {
        removeItem(remaining, job);
        this.complete(job, currentTime, completed);
        current = undefined;
      }
    }

    return { completedJobs: completed, metrics: computeMetrics(completed) };
  }
}
