/**
 * Shortest Job First (non-preemptive)
 *
 * Among arrived jobs, the smallest burst time runs to completion; ties go
 * to the job listed first in the workload.
 */

import type { Job } from '../../core/job.js';
import { computeMetrics } from '../../core/metrics.js';
import type { ScheduleResult } from '../../types/scheduling.js';
import { BaseScheduler } from '../BaseScheduler.js';
import { nextArrival, removeItem, selectMin } from '../selection.js';

export class SjfScheduler extends BaseScheduler {
  public readonly name = 'SJF';

  protected run(jobs: Job[]): ScheduleResult {
    const completed: Job[] = [];
    const remaining = [...jobs];
    let currentTime = 0;

    while (remaining.length > 0) {
      const available = remaining.filter((job) => job.arrivalTime <= currentTime);
      const job = selectMin(available, (candidate) => candidate.burstTime);

      if (!job) {
        const arrival = nextArrival(remaining) ?? currentTime;
        this.idle(currentTime, arrival);
        currentTime = arrival;
        continue;
      }

      removeItem(remaining, job);
      this.dispatch(job, currentTime);
      currentTime += job.remainingTime;
      job.remainingTime = 0;
      this.complete(job, currentTime, completed);
    }

    return { completedJobs: completed, metrics: computeMetrics(completed) };
  }
}
