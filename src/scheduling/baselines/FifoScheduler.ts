/**
 * First In, First Out
 *
 * Jobs run to completion in arrival order; equal arrivals keep input order.
 */

import type { Job } from '../../core/job.js';
import { computeMetrics } from '../../core/metrics.js';
import type { ScheduleResult } from '../../types/scheduling.js';
import { BaseScheduler } from '../BaseScheduler.js';
import { sortByArrival } from '../selection.js';

export class FifoScheduler extends BaseScheduler {
  public readonly name = 'FIFO';

  protected run(jobs: Job[]): ScheduleResult {
    const completed: Job[] = [];
    let currentTime = 0;

    for (const job of sortByArrival(jobs)) {
      if (currentTime < job.arrivalTime) {
        this.idle(currentTime, job.arrivalTime);
        currentTime = job.arrivalTime;
      }

      this.dispatch(job, currentTime);
      currentTime += job.remainingTime;
      job.remainingTime = 0;
      this.complete(job, currentTime, completed);
    }

    return { completedJobs: completed, metrics: computeMetrics(completed) };
  }
}
