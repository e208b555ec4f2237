/**
 * Job model
 *
 * The single mutable entity of a simulation run. Identity, arrival, burst
 * and I/O parameters are fixed at construction; everything else belongs to
 * the engine that owns the job during a run.
 */

import { zodErrorToSimulatorError } from '../api/errors.js';
import { JobSpecSchema } from '../types/schemas/job.js';
import type { JobSpec, JobSpecInput } from '../types/schemas/job.js';

export type JobId = number | string;

export class Job {
  public readonly jobId: JobId;
  public readonly arrivalTime: number;
  public readonly burstTime: number;
  public readonly ioDuration: number;

  /**
   * CPU ticks still required; reaches exactly 0 at completion
   */
  public remainingTime: number;

  /**
   * Current MLFQ level (0 = highest); other engines leave it alone
   */
  public priority: number;

  /**
   * CPU ticks accumulated at the current level since the last demotion or boost
   */
  public timeInQueue = 0;

  public startTime?: number;
  public completionTime?: number;

  public waitingForIo = false;
  public ioReturnTime?: number;

  // Cumulative-CPU offsets not yet consumed, ascending
  private readonly pendingIo: number[];

  constructor(spec: JobSpecInput) {
    const parsed = JobSpecSchema.safeParse(spec);
    if (!parsed.success) {
      throw zodErrorToSimulatorError(parsed.error, `Job ${String(spec.jobId)}`);
    }

    const data: JobSpec = parsed.data;
    this.jobId = data.jobId;
    this.arrivalTime = data.arrivalTime;
    this.burstTime = data.burstTime;
    this.ioDuration = data.ioDuration;
    this.priority = data.priority;
    this.remainingTime = data.burstTime;
    this.pendingIo = [...data.ioOperations];
  }

  /**
   * Copy of the I/O offsets still to be consumed
   */
  public get ioOperations(): number[] {
    return [...this.pendingIo];
  }

  /**
   * CPU ticks consumed so far
   */
  public get cpuTimeConsumed(): number {
    return this.burstTime - this.remainingTime;
  }

  public get isComplete(): boolean {
    return this.remainingTime === 0;
  }

  /**
   * Returns true and consumes the next I/O offset iff it equals
   * `cpuTimeConsumed` exactly.
   */
  public needsIO(cpuTimeConsumed: number): boolean {
    if (this.pendingIo.length > 0 && this.pendingIo[0] === cpuTimeConsumed) {
      this.pendingIo.shift();
      return true;
    }
    return false;
  }

  /**
   * Deep copy, including run state and unconsumed I/O offsets
   */
  public clone(): Job {
    const copy = new Job({
      jobId: this.jobId,
      arrivalTime: this.arrivalTime,
      burstTime: this.burstTime,
      priority: this.priority,
      ioOperations: [...this.pendingIo],
      ioDuration: this.ioDuration,
    });

    copy.remainingTime = this.remainingTime;
    copy.timeInQueue = this.timeInQueue;
    copy.startTime = this.startTime;
    copy.completionTime = this.completionTime;
    copy.waitingForIo = this.waitingForIo;
    copy.ioReturnTime = this.ioReturnTime;

    return copy;
  }
}

/**
 * Build a workload from plain specifications
 *
 * @example
 * ```typescript
 * const jobs = createJobs([
 *   { jobId: 1, arrivalTime: 0, burstTime: 10 },
 *   { jobId: 2, arrivalTime: 0, burstTime: 5, ioOperations: [2], ioDuration: 3 },
 * ]);
 * ```
 */
export function createJobs(specs: readonly JobSpecInput[]): Job[] {
  return specs.map((spec) => new Job(spec));
}
