/**
 * Scheduling types shared by every policy engine
 *
 * Defines engine options, run results, the MLFQ timeline and the events
 * engines emit while a run advances.
 */

import type { Job, JobId } from '../core/job.js';

/**
 * Turnaround/response statistics for one run
 *
 * `turnaroundTimes` and `responseTimes` are parallel to the completed-job
 * order of the run that produced them.
 */
export interface SchedulingMetrics {
  /**
   * Mean of completionTime - arrivalTime
   */
  avgTurnaround: number;

  /**
   * Mean of startTime - arrivalTime
   */
  avgResponse: number;

  turnaroundTimes: number[];

  responseTimes: number[];
}

/**
 * Status of the CPU during one simulated tick
 */
export type TickStatus = 'RUNNING' | 'IO' | 'IDLE';

/**
 * One MLFQ timeline entry (one per simulated tick)
 */
export type TimelineEntry =
  | {
      time: number;
      status: 'IDLE';
    }
  | {
      time: number;
      status: 'RUNNING' | 'IO';
      jobId: JobId;
      /**
       * Queue level the job occupied while this tick ran
       */
      priority: number;
    };

/**
 * MLFQ metrics carry the per-tick timeline in addition to the common stats
 */
export interface MlfqMetrics extends SchedulingMetrics {
  timeline: TimelineEntry[];
}

/**
 * Result of one `schedule` call
 */
export interface ScheduleResult<M extends SchedulingMetrics = SchedulingMetrics> {
  /**
   * Completed jobs in completion-event order
   */
  completedJobs: Job[];

  metrics: M;
}

/**
 * Common engine contract
 */
export interface Scheduler<M extends SchedulingMetrics = SchedulingMetrics> {
  /**
   * Display name used by reports
   */
  readonly name: string;

  schedule(jobs: readonly Job[]): ScheduleResult<M>;
}

/**
 * MLFQ engine options
 */
export interface MlfqOptions {
  /**
   * Number of priority levels (level 0 is highest)
   * @default 4
   */
  numQueues: number;

  /**
   * Ticks a single dispatch may run at each level
   * @default 2^level
   */
  timeQuantums?: number[];

  /**
   * Ticks a job may accumulate at each level before demotion
   * @default 2 × quantum
   */
  timeAllotments?: number[];

  /**
   * Ticks between priority boosts; null disables boosting
   * @default 1000
   */
  boostInterval: number | null;
}

/**
 * Round Robin engine options
 */
export interface RoundRobinOptions {
  /**
   * Maximum ticks per dispatch
   * @default 2
   */
  timeQuantum: number;
}

/**
 * CFS engine options
 */
export interface CfsOptions {
  /**
   * Minimum consecutive ticks a dispatched job keeps the CPU
   * @default 1
   */
  minGranularity: number;
}

/**
 * Dispatch event payload
 */
export interface DispatchEvent {
  time: number;
  jobId: JobId;
  /**
   * Queue level for MLFQ dispatches
   */
  priority?: number;
  /**
   * True on the job's first dispatch
   */
  firstRun: boolean;
}

/**
 * Events emitted by every engine
 */
export interface SchedulerEvents {
  dispatch: (event: DispatchEvent) => void;
  complete: (job: Job, time: number) => void;
  idle: (from: number, to: number) => void;
  boost: (time: number, boosted: number) => void;
  demote: (jobId: JobId, from: number, to: number, time: number) => void;
  io: (jobId: JobId, time: number, returnsAt: number) => void;
}
