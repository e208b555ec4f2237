/**
 * Multi-Level Feedback Queue
 *
 * Implements the classic MLFQ rules:
 * - New jobs enter the top level (0)
 * - The first non-empty level is served, FIFO within a level
 * - A job that uses up its allotment at a level is demoted one level
 * - Every `boostInterval` ticks all queued jobs and the running job return to level 0
 * - A job that reaches an I/O offset leaves the CPU and comes back at the
 *   same level once its I/O completes
 *
 * Each tick runs the same fixed sequence: boost, I/O returns, arrivals,
 * retire/requeue the running job, select, execute one tick, advance the
 * clock. Every simulated tick, idle or not, produces one timeline entry.
 */

import { zodErrorToSimulatorError } from '../api/errors.js';
import { MLFQ, defaultTimeAllotments, defaultTimeQuantums } from '../config/defaults.js';
import type { Job } from '../core/job.js';
import { computeMetrics } from '../core/metrics.js';
import { MlfqOptionsSchema } from '../types/schemas/engine.js';
import type {
  MlfqMetrics,
  MlfqOptions,
  ScheduleResult,
  TimelineEntry,
} from '../types/scheduling.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { BaseScheduler, type SchedulerDependencies } from './BaseScheduler.js';
import { sortByArrival } from './selection.js';

/**
 * Resolved MLFQ configuration (all lists filled in)
 */
export interface ResolvedMlfqOptions {
  numQueues: number;
  timeQuantums: number[];
  timeAllotments: number[];
  boostInterval: number | null;
}

/**
 * The job holding the CPU and what happened to it on its last tick
 */
interface RunningSlot {
  job: Job;
  /**
   * Ticks left in the current dispatch
   */
  budget: number;
  /**
   * Set when the last tick hit an I/O offset
   */
  yieldedForIo: boolean;
}

export class MlfqScheduler extends BaseScheduler<MlfqMetrics> {
  public readonly name = 'MLFQ';
  public readonly options: ResolvedMlfqOptions;

  /**
   * @throws ConfigurationError when a quantum or allotment list does not
   * have one entry per level, or any value is not a positive integer
   */
  constructor(options: Partial<MlfqOptions> = {}, dependencies: SchedulerDependencies = {}) {
    super(dependencies);

    const parsed = MlfqOptionsSchema.safeParse({
      numQueues: options.numQueues ?? MLFQ.NUM_QUEUES,
      timeQuantums: options.timeQuantums,
      timeAllotments: options.timeAllotments,
      boostInterval: options.boostInterval === undefined ? MLFQ.BOOST_INTERVAL : options.boostInterval,
    });
    if (!parsed.success) {
      throw zodErrorToSimulatorError(parsed.error, 'MLFQ options');
    }

    const timeQuantums = parsed.data.timeQuantums ?? defaultTimeQuantums(parsed.data.numQueues);
    this.options = {
      numQueues: parsed.data.numQueues,
      timeQuantums,
      timeAllotments: parsed.data.timeAllotments ?? defaultTimeAllotments(timeQuantums),
      boostInterval: parsed.data.boostInterval,
    };

    this.logger?.debug({ policy: this.name, ...this.options }, 'MLFQ configured');
  }

  protected run(jobs: Job[]): ScheduleResult<MlfqMetrics> {
    const { numQueues, timeQuantums, timeAllotments, boostInterval } = this.options;
    const lowestLevel = numQueues - 1;

    const waiting = sortByArrival(jobs);
    const queues: Job[][] = Array.from({ length: numQueues }, () => []);
    const ioWait: Job[] = [];
    const completed: Job[] = [];
    const timeline: TimelineEntry[] = [];

    let running: RunningSlot | undefined;
    let currentTime = 0;
    let ticksSinceBoost = 0;

    const queuedCount = (): number => queues.reduce((total, queue) => total + queue.length, 0);
    const hasWork = (): boolean =>
      waiting.length > 0 || queuedCount() > 0 || running !== undefined || ioWait.length > 0;

    while (hasWork()) {
      // 1. Priority boost (jobs in I/O wait are left alone)
      if (boostInterval !== null && ticksSinceBoost >= boostInterval) {
        const boosted = queues.flat();
        for (const queue of queues) {
          queue.length = 0;
        }
        for (const job of boosted) {
          job.priority = 0;
          job.timeInQueue = 0;
        }
        queues[0].push(...boosted);

        if (running) {
          running.job.priority = 0;
          running.job.timeInQueue = 0;
        }

        ticksSinceBoost = 0;
        const boostedCount = boosted.length + (running ? 1 : 0);
        lazyLog(this.logger, 'debug', () => ({ time: currentTime, boosted: boostedCount }), 'Priority boost');
        this.emit('boost', currentTime, boostedCount);
      }

      // 2. I/O returns, at the level the job left with
      for (const job of ioWait.filter((blocked) => currentTime >= (blocked.ioReturnTime ?? Infinity))) {
        ioWait.splice(ioWait.indexOf(job), 1);
        job.waitingForIo = false;
        job.ioReturnTime = undefined;
        queues[job.priority].push(job);
        lazyLog(
          this.logger,
          'trace',
          () => ({ time: currentTime, jobId: job.jobId, priority: job.priority }),
          'I/O returned'
        );
      }

      // 3. Arrivals enter the top level
      while (waiting.length > 0 && waiting[0].arrivalTime <= currentTime) {
        const job = waiting.shift();
        if (job) {
          job.priority = 0;
          job.timeInQueue = 0;
          queues[0].push(job);
        }
      }

      // 4. Retire or requeue the running job
      if (running) {
        const { job } = running;

        if (job.remainingTime === 0) {
          this.complete(job, currentTime, completed);
          running = undefined;
        } else if (running.yieldedForIo) {
          job.waitingForIo = true;
          job.ioReturnTime = currentTime + job.ioDuration;
          ioWait.push(job);
          this.emit('io', job.jobId, currentTime, job.ioReturnTime);
          running = undefined;
        } else if (running.budget <= 0) {
          if (job.timeInQueue >= timeAllotments[job.priority]) {
            const from = job.priority;
            job.priority = Math.min(from + 1, lowestLevel);
            job.timeInQueue = 0;
            if (job.priority !== from) {
              lazyLog(
                this.logger,
                'debug',
                () => ({ time: currentTime, jobId: job.jobId, from, to: job.priority }),
                'Demoted'
              );
              this.emit('demote', job.jobId, from, job.priority, currentTime);
            }
          }
          queues[job.priority].push(job);
          running = undefined;
        }
      }

      if (!hasWork()) {
        break;
      }

      // 5. Select from the highest non-empty level
      if (!running) {
        const level = queues.findIndex((queue) => queue.length > 0);
        const job = level === -1 ? undefined : queues[level].shift();
        if (job) {
          running = { job, budget: timeQuantums[level], yieldedForIo: false };
          this.dispatch(job, currentTime, level);
        }
      }

      // 6. Execute one tick
      if (running) {
        const { job } = running;
        if (job.needsIO(job.cpuTimeConsumed)) {
          running.yieldedForIo = true;
          timeline.push({ time: currentTime, status: 'IO', jobId: job.jobId, priority: job.priority });
        } else {
          job.remainingTime -= 1;
          job.timeInQueue += 1;
          running.budget -= 1;
          timeline.push({ time: currentTime, status: 'RUNNING', jobId: job.jobId, priority: job.priority });
        }
      } else {
        timeline.push({ time: currentTime, status: 'IDLE' });
        this.idle(currentTime, currentTime + 1);
      }

      // 7. Advance the clock
      currentTime += 1;
      ticksSinceBoost += 1;
    }

    return {
      completedJobs: completed,
      metrics: { ...computeMetrics(completed), timeline },
    };
  }
}
