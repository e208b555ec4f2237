/**
 * MlfqScheduler tests
 *
 * Tests cover:
 * - Option resolution and validation
 * - Demotion by allotment
 * - Priority boost (including the running job)
 * - I/O yield and return at the same level
 * - Timeline shape
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../src/api/errors.js';
import { createJobs } from '../../../src/core/job.js';
import { MlfqScheduler } from '../../../src/scheduling/MlfqScheduler.js';
import type { JobId } from '../../../src/core/job.js';
import type { TimelineEntry } from '../../../src/types/scheduling.js';
import { recordDispatches } from '../../helpers/events.js';

/**
 * Level per tick, 'idle' for idle ticks
 */
function levels(timeline: TimelineEntry[]): Array<number | 'idle'> {
  return timeline.map((entry) => (entry.status === 'IDLE' ? 'idle' : entry.priority));
}

function recordDemotions(scheduler: MlfqScheduler): Array<[JobId, number, number, number]> {
  const demotions: Array<[JobId, number, number, number]> = [];
  scheduler.on('demote', (jobId, from, to, time) => demotions.push([jobId, from, to, time]));
  return demotions;
}

describe('MlfqScheduler', () => {
  describe('options', () => {
    it('should derive quantums and allotments from the level count', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3 });

      expect(scheduler.options).toEqual({
        numQueues: 3,
        timeQuantums: [1, 2, 4],
        timeAllotments: [2, 4, 8],
        boostInterval: 1000,
      });
    });

    it('should default to four levels', () => {
      const scheduler = new MlfqScheduler();

      expect(scheduler.options.numQueues).toBe(4);
      expect(scheduler.options.timeQuantums).toEqual([1, 2, 4, 8]);
    });

    it('should derive allotments from explicit quantums', () => {
      const scheduler = new MlfqScheduler({ numQueues: 2, timeQuantums: [3, 5] });

      expect(scheduler.options.timeAllotments).toEqual([6, 10]);
    });

    it('should reject a quantum list of the wrong length', () => {
      expect(() => new MlfqScheduler({ numQueues: 3, timeQuantums: [1, 2] })).toThrow(
        "MLFQ options: Validation error on field 'timeQuantums': Expected 3 time quantums, got 2"
      );
    });

    it('should reject an allotment list of the wrong length', () => {
      expect(() => new MlfqScheduler({ numQueues: 2, timeAllotments: [4] })).toThrow(ConfigurationError);
    });

    it('should reject a zero boost interval and accept null', () => {
      expect(() => new MlfqScheduler({ boostInterval: 0 })).toThrow(ConfigurationError);
      expect(new MlfqScheduler({ boostInterval: null }).options.boostInterval).toBeNull();
    });
  });

  describe('demotion', () => {
    it('should walk a long job down the levels', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: null });
      const demotions = recordDemotions(scheduler);

      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([{ jobId: 1, arrivalTime: 0, burstTime: 15 }])
      );

      expect(levels(metrics.timeline)).toEqual([0, 0, 1, 1, 1, 1, 2, 2, 2, 2, 2, 2, 2, 2, 2]);
      expect(demotions).toEqual([
        [1, 0, 1, 2],
        [1, 1, 2, 6],
      ]);
      expect(completedJobs[0].completionTime).toBe(15);
    });

    it('should serve a new arrival at the top level ahead of a demoted job', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: null });

      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([
          { jobId: 1, arrivalTime: 0, burstTime: 20 },
          { jobId: 2, arrivalTime: 5, burstTime: 3 },
        ])
      );

      expect(completedJobs.map((job) => job.jobId)).toEqual([2, 1]);
      expect(completedJobs.map((job) => [job.startTime, job.completionTime])).toEqual([
        [6, 9],
        [0, 23],
      ]);
      expect(metrics.avgResponse).toBe(0.5);
      expect(metrics.timeline[5]).toEqual({ time: 5, status: 'RUNNING', jobId: 1, priority: 1 });
      expect(metrics.timeline[6]).toEqual({ time: 6, status: 'RUNNING', jobId: 2, priority: 0 });
    });
  });

  describe('priority boost', () => {
    it('should return the running job to the top level', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: 10 });
      const boosts: Array<[number, number]> = [];
      scheduler.on('boost', (time, boosted) => boosts.push([time, boosted]));
      const dispatches = recordDispatches(scheduler);

      const { metrics } = scheduler.schedule(createJobs([{ jobId: 1, arrivalTime: 0, burstTime: 15 }]));

      expect(levels(metrics.timeline)).toEqual([0, 0, 1, 1, 1, 1, 2, 2, 2, 2, 0, 0, 1, 1, 1]);
      expect(boosts).toEqual([[10, 1]]);
      expect(dispatches.find((event) => event.time >= 10)?.priority).toBe(0);
    });

    it('should leave jobs waiting on I/O at their level', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: 5 });
      const boosts: Array<[number, number]> = [];
      scheduler.on('boost', (time, boosted) => boosts.push([time, boosted]));

      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([{ jobId: 1, arrivalTime: 0, burstTime: 10, ioOperations: [3], ioDuration: 5 }])
      );

      expect(levels(metrics.timeline)).toEqual([
        0, 0, 1, 1, 'idle', 'idle', 'idle', 'idle', 'idle', 1, 0, 0, 1, 1, 1, 0,
      ]);
      expect(boosts).toEqual([
        [5, 0],
        [10, 1],
        [15, 1],
      ]);
      expect(completedJobs[0].completionTime).toBe(16);
    });
  });

  describe('I/O', () => {
    it('should yield the CPU at an I/O offset and resume at the same level', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: null });
      const ioEvents: Array<[JobId, number, number]> = [];
      scheduler.on('io', (jobId, time, returnsAt) => ioEvents.push([jobId, time, returnsAt]));

      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([{ jobId: 1, arrivalTime: 0, burstTime: 6, ioOperations: [2], ioDuration: 3 }])
      );

      expect(metrics.timeline.map((entry) => entry.status)).toEqual([
        'RUNNING',
        'RUNNING',
        'IO',
        'IDLE',
        'IDLE',
        'IDLE',
        'RUNNING',
        'RUNNING',
        'RUNNING',
        'RUNNING',
      ]);
      expect(metrics.timeline[2]).toEqual({ time: 2, status: 'IO', jobId: 1, priority: 1 });
      expect(levels(metrics.timeline).slice(6)).toEqual([1, 1, 1, 1]);
      expect(ioEvents).toEqual([[1, 3, 6]]);
      expect(completedJobs[0].completionTime).toBe(10);
    });

    it('should keep time in queue across an I/O wait', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: null });
      const demotions = recordDemotions(scheduler);

      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([{ jobId: 1, arrivalTime: 0, burstTime: 10, ioOperations: [5], ioDuration: 1 }])
      );

      expect(levels(metrics.timeline)).toEqual([0, 0, 1, 1, 1, 1, 'idle', 1, 1, 2, 2, 2]);
      expect(demotions).toEqual([
        [1, 0, 1, 2],
        [1, 1, 2, 9],
      ]);
      expect(completedJobs[0].completionTime).toBe(12);
    });
  });

  describe('same-level ordering', () => {
    it('should round-robin two jobs sharing a level', () => {
      const scheduler = new MlfqScheduler({ numQueues: 2, timeQuantums: [2, 4], boostInterval: null });
      const dispatches = recordDispatches(scheduler);

      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([
          { jobId: 'A', arrivalTime: 0, burstTime: 4 },
          { jobId: 'B', arrivalTime: 0, burstTime: 4 },
        ])
      );

      expect(metrics.timeline.map((entry) => (entry.status === 'IDLE' ? 'idle' : entry.jobId))).toEqual([
        'A', 'A', 'B', 'B', 'A', 'A', 'B', 'B',
      ]);
      expect(levels(metrics.timeline)).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
      expect(dispatches.map((event) => [event.jobId, event.time])).toEqual([
        ['A', 0],
        ['B', 2],
        ['A', 4],
        ['B', 6],
      ]);
      expect(completedJobs.map((job) => [job.jobId, job.completionTime])).toEqual([
        ['A', 6],
        ['B', 8],
      ]);
    });

    it('should queue I/O returns, then arrivals, then the preempted job on one tick', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, timeQuantums: [2, 4, 8], boostInterval: null });

      // At tick 4 'io' returns, 'new' arrives and 'cpu' exhausts its quantum at level 0
      const { completedJobs, metrics } = scheduler.schedule(
        createJobs([
          { jobId: 'io', arrivalTime: 0, burstTime: 3, ioOperations: [1], ioDuration: 2 },
          { jobId: 'cpu', arrivalTime: 0, burstTime: 6 },
          { jobId: 'new', arrivalTime: 4, burstTime: 2 },
        ])
      );

      expect(
        metrics.timeline.map((entry) =>
          entry.status === 'IDLE' ? 'idle' : entry.status === 'IO' ? `${entry.jobId}*` : entry.jobId
        )
      ).toEqual(['io', 'io*', 'cpu', 'cpu', 'io', 'io', 'new', 'new', 'cpu', 'cpu', 'cpu', 'cpu']);
      expect(levels(metrics.timeline)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 1, 1]);
      expect(completedJobs.map((job) => [job.jobId, job.completionTime])).toEqual([
        ['io', 6],
        ['new', 8],
        ['cpu', 12],
      ]);
    });
  });

  describe('timeline', () => {
    it('should record one entry per tick including leading idle time', () => {
      const scheduler = new MlfqScheduler({ numQueues: 2, boostInterval: null });

      const { metrics } = scheduler.schedule(createJobs([{ jobId: 'late', arrivalTime: 3, burstTime: 1 }]));

      expect(metrics.timeline).toEqual([
        { time: 0, status: 'IDLE' },
        { time: 1, status: 'IDLE' },
        { time: 2, status: 'IDLE' },
        { time: 3, status: 'RUNNING', jobId: 'late', priority: 0 },
      ]);
    });

    it('should be reusable across runs', () => {
      const scheduler = new MlfqScheduler({ numQueues: 3, boostInterval: null });
      const jobs = createJobs([{ jobId: 1, arrivalTime: 0, burstTime: 4, ioOperations: [1], ioDuration: 2 }]);

      const first = scheduler.schedule(jobs);
      const second = scheduler.schedule(jobs);

      expect(second.metrics.timeline).toEqual(first.metrics.timeline);
      expect(jobs[0].ioOperations).toEqual([1]);
    });
  });
});
