/**
 * Metrics calculator
 *
 * Derives turnaround and response statistics from a completed-job
 * collection, in collection order.
 */

import { MetricsError } from '../api/errors.js';
import type { SchedulingMetrics } from '../types/scheduling.js';
import { mean } from '../utils/math-helpers.js';
import type { Job } from './job.js';

/**
 * Compute turnaround/response statistics
 *
 * @throws MetricsError `EmptyResult` when no job completed;
 * `InvariantViolation` when a job in the collection lacks a start or
 * completion time.
 */
export function computeMetrics(completedJobs: readonly Job[]): SchedulingMetrics {
  const turnaroundTimes: number[] = [];
  const responseTimes: number[] = [];

  for (const job of completedJobs) {
    if (job.startTime === undefined || job.completionTime === undefined) {
      throw new MetricsError('InvariantViolation', `Job ${String(job.jobId)} is not complete`, {
        jobId: job.jobId,
        startTime: job.startTime,
        completionTime: job.completionTime,
      });
    }
    turnaroundTimes.push(job.completionTime - job.arrivalTime);
    responseTimes.push(job.startTime - job.arrivalTime);
  }

  const avgTurnaround = mean(turnaroundTimes);
  const avgResponse = mean(responseTimes);
  if (avgTurnaround === undefined || avgResponse === undefined) {
    throw new MetricsError('EmptyResult', 'Cannot compute metrics for an empty completed-job collection');
  }

  return {
    avgTurnaround,
    avgResponse,
    turnaroundTimes,
    responseTimes,
  };
}
