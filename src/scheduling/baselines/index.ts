export { FifoScheduler } from './FifoScheduler.js';
export { SjfScheduler } from './SjfScheduler.js';
export { StcfScheduler } from './StcfScheduler.js';
export { RoundRobinScheduler } from './RoundRobinScheduler.js';
