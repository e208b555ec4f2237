/**
 * Zod schema exports for simulator input validation
 *
 * @example
 * ```typescript
 * import { JobSpecSchema } from 'sched-sim';
 *
 * const result = JobSpecSchema.safeParse({ jobId: 1, arrivalTime: 0, burstTime: 5 });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

export * from './common.js';
export * from './job.js';
export * from './engine.js';
export * from './config.js';
