/**
 * Engine option schemas
 *
 * Cross-field rules (list lengths against level count) are checked here;
 * a misconfigured engine fails in its constructor.
 */

import { z } from 'zod';
import { PositiveInteger } from './common.js';

export const MlfqOptionsSchema = z
  .object({
    numQueues: PositiveInteger,
    timeQuantums: z.array(PositiveInteger).optional(),
    timeAllotments: z.array(PositiveInteger).optional(),
    boostInterval: PositiveInteger.nullable(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.timeQuantums && options.timeQuantums.length !== options.numQueues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['timeQuantums'],
        message: `Expected ${options.numQueues} time quantums, got ${options.timeQuantums.length}`,
      });
    }
    if (options.timeAllotments && options.timeAllotments.length !== options.numQueues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['timeAllotments'],
        message: `Expected ${options.numQueues} time allotments, got ${options.timeAllotments.length}`,
      });
    }
  });

export const RoundRobinOptionsSchema = z
  .object({
    timeQuantum: PositiveInteger,
  })
  .strict();

export const CfsOptionsSchema = z
  .object({
    minGranularity: PositiveInteger,
  })
  .strict();
