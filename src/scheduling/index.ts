/**
 * Scheduling module exports
 */

export { BaseScheduler, type SchedulerDependencies } from './BaseScheduler.js';
export { MlfqScheduler, type ResolvedMlfqOptions } from './MlfqScheduler.js';
export { CfsScheduler } from './CfsScheduler.js';
export {
  FifoScheduler,
  SjfScheduler,
  StcfScheduler,
  RoundRobinScheduler,
} from './baselines/index.js';
export { createScheduler } from './factory.js';
export { selectMin, sortByArrival } from './selection.js';
