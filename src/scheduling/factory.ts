/**
 * Scheduler factory
 *
 * Builds engines from the snake_case configuration sections so the
 * comparison harness and the CLI share one mapping.
 */

import type { SimulatorConfig } from '../config/loader.js';
import type { PolicyId } from '../types/schemas/config.js';
import type { Scheduler } from '../types/scheduling.js';
import type { SchedulerDependencies } from './BaseScheduler.js';
import { CfsScheduler } from './CfsScheduler.js';
import { MlfqScheduler } from './MlfqScheduler.js';
import {
  FifoScheduler,
  RoundRobinScheduler,
  SjfScheduler,
  StcfScheduler,
} from './baselines/index.js';

export function createScheduler(
  policy: PolicyId,
  config: Pick<SimulatorConfig, 'mlfq' | 'round_robin' | 'cfs'>,
  dependencies: SchedulerDependencies = {}
): Scheduler {
  switch (policy) {
    case 'mlfq':
      return new MlfqScheduler(
        {
          numQueues: config.mlfq.num_queues,
          timeQuantums: config.mlfq.time_quantums ?? undefined,
          timeAllotments: config.mlfq.time_allotments ?? undefined,
          boostInterval: config.mlfq.boost_interval,
        },
        dependencies
      );
    case 'stcf':
      return new StcfScheduler(dependencies);
    case 'round_robin':
      return new RoundRobinScheduler({ timeQuantum: config.round_robin.time_quantum }, dependencies);
    case 'fifo':
      return new FifoScheduler(dependencies);
    case 'sjf':
      return new SjfScheduler(dependencies);
    case 'cfs':
      return new CfsScheduler({ minGranularity: config.cfs.min_granularity }, dependencies);
  }
}
