/**
 * Job specification schemas
 *
 * Validates the fixed parameters of a job before any engine sees it.
 * Invalid jobs are configuration errors, never coerced.
 */

import { z } from 'zod';
import { JobIdSchema, NonNegativeInteger, PositiveInteger } from './common.js';

/**
 * Default number of ticks a job stays blocked after yielding for I/O
 */
export const DEFAULT_IO_DURATION = 5;

export const JobSpecSchema = z
  .object({
    jobId: JobIdSchema,
    arrivalTime: NonNegativeInteger,
    burstTime: z
      .number()
      .int('Burst time must be an integer')
      .positive('Burst time must be positive')
      .safe('Burst time must be a safe integer'),
    priority: NonNegativeInteger.default(0),
    ioOperations: z.array(NonNegativeInteger).default([]),
    ioDuration: PositiveInteger.default(DEFAULT_IO_DURATION),
  })
  .strict()
  .superRefine((spec, ctx) => {
    spec.ioOperations.forEach((offset, index) => {
      if (offset >= spec.burstTime) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ioOperations', index],
          message: `I/O offset ${offset} must be less than burst time ${spec.burstTime}`,
        });
      }
      if (index > 0 && offset <= spec.ioOperations[index - 1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ioOperations', index],
          message: 'I/O offsets must be strictly increasing',
        });
      }
    });
  });

/**
 * Job specification as written by callers (defaults optional)
 */
export type JobSpecInput = z.input<typeof JobSpecSchema>;

/**
 * Job specification after defaults are applied
 */
export type JobSpec = z.output<typeof JobSpecSchema>;

/**
 * Workload file: a bare list of jobs or `{ jobs: [...] }`
 */
export const WorkloadSchema = z.union([
  z.array(JobSpecSchema),
  z.object({ jobs: z.array(JobSpecSchema) }).transform((workload) => workload.jobs),
]);
