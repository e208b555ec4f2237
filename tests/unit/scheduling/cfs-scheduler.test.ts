/**
 * CfsScheduler tests
 *
 * - Lowest-vruntime selection and tie-breaking by ready order
 * - Newcomer vruntime placement
 * - Minimum granularity
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../../src/api/errors.js';
import { createJobs } from '../../../src/core/job.js';
import { CfsScheduler } from '../../../src/scheduling/CfsScheduler.js';
import { recordDispatches } from '../../helpers/events.js';

describe('CfsScheduler', () => {
  it('should alternate between equal jobs every tick', () => {
    const scheduler = new CfsScheduler();
    const dispatches = recordDispatches(scheduler);

    const { completedJobs } = scheduler.schedule(
      createJobs([
        { jobId: 1, arrivalTime: 0, burstTime: 4 },
        { jobId: 2, arrivalTime: 0, burstTime: 4 },
      ])
    );

    expect(dispatches.map((event) => event.jobId)).toEqual([1, 2, 1, 2, 1, 2, 1, 2]);
    expect(completedJobs.map((job) => [job.jobId, job.completionTime])).toEqual([
      [1, 7],
      [2, 8],
    ]);
  });

  it('should start a newcomer at the lowest ready vruntime', () => {
    const { completedJobs } = new CfsScheduler().schedule(
      createJobs([
        { jobId: 1, arrivalTime: 0, burstTime: 3 },
        { jobId: 2, arrivalTime: 2, burstTime: 2 },
      ])
    );

    expect(completedJobs.map((job) => [job.jobId, job.startTime, job.completionTime])).toEqual([
      [1, 0, 3],
      [2, 3, 5],
    ]);
  });

  it('should skip idle time to the next arrival', () => {
    const scheduler = new CfsScheduler();
    const idleGaps: Array<[number, number]> = [];
    scheduler.on('idle', (from, to) => idleGaps.push([from, to]));

    const { completedJobs } = scheduler.schedule(
      createJobs([
        { jobId: 1, arrivalTime: 0, burstTime: 2 },
        { jobId: 2, arrivalTime: 5, burstTime: 1 },
      ])
    );

    expect(idleGaps).toEqual([[2, 5]]);
    expect(completedJobs[1].startTime).toBe(5);
    expect(completedJobs[1].completionTime).toBe(6);
  });

  it('should interleave a late arrival with a running job', () => {
    const scheduler = new CfsScheduler();
    const dispatches = recordDispatches(scheduler);

    const { completedJobs } = scheduler.schedule(
      createJobs([
        { jobId: 'A', arrivalTime: 0, burstTime: 1 },
        { jobId: 'B', arrivalTime: 0, burstTime: 5 },
        { jobId: 'C', arrivalTime: 3, burstTime: 2 },
      ])
    );

    expect(dispatches.map((event) => [event.jobId, event.time])).toEqual([
      ['A', 0],
      ['B', 1],
      ['C', 4],
      ['B', 5],
      ['C', 6],
      ['B', 7],
    ]);
    expect(completedJobs.map((job) => job.jobId)).toEqual(['A', 'C', 'B']);
    expect(completedJobs.map((job) => job.completionTime)).toEqual([1, 7, 8]);
  });

  it('should flag only the first dispatch of each job', () => {
    const scheduler = new CfsScheduler();
    const dispatches = recordDispatches(scheduler);

    scheduler.schedule(
      createJobs([
        { jobId: 1, arrivalTime: 0, burstTime: 2 },
        { jobId: 2, arrivalTime: 0, burstTime: 2 },
      ])
    );

    expect(dispatches.map((event) => event.firstRun)).toEqual([true, true, false, false]);
  });

  describe('minGranularity', () => {
    it('should hold the CPU for at least the minimum slice', () => {
      const scheduler = new CfsScheduler({ minGranularity: 2 });
      const dispatches = recordDispatches(scheduler);

      const { completedJobs } = scheduler.schedule(
        createJobs([
          { jobId: 1, arrivalTime: 0, burstTime: 4 },
          { jobId: 2, arrivalTime: 0, burstTime: 4 },
        ])
      );

      expect(dispatches.map((event) => [event.jobId, event.time])).toEqual([
        [1, 0],
        [2, 2],
        [1, 4],
        [2, 6],
      ]);
      expect(completedJobs.map((job) => job.completionTime)).toEqual([6, 8]);
    });

    it('should reject a zero minimum slice', () => {
      expect(() => new CfsScheduler({ minGranularity: 0 })).toThrow(ConfigurationError);
    });
  });
});
