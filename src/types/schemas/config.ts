/**
 * Simulator Configuration Schemas
 *
 * Zod schemas for validating simulator.yaml.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { LogLevelSchema } from './common.js';

export const PolicyIdSchema = z.enum(['mlfq', 'stcf', 'round_robin', 'fifo', 'sjf', 'cfs']);

/**
 * MLFQ Configuration
 */
export const MlfqConfigSchema = z
  .object({
    num_queues: z.number().int().positive('Number of queues must be positive'),
    time_quantums: z.array(z.number().int().positive('Quantum must be positive')).nullable(),
    time_allotments: z.array(z.number().int().positive('Allotment must be positive')).nullable(),
    boost_interval: z.number().int().positive('Boost interval must be positive').nullable(),
  })
  .refine(
    (data) => data.time_quantums === null || data.time_quantums.length === data.num_queues,
    {
      message: 'must have one entry per queue',
      path: ['time_quantums'],
    }
  )
  .refine(
    (data) => data.time_allotments === null || data.time_allotments.length === data.num_queues,
    {
      message: 'must have one entry per queue',
      path: ['time_allotments'],
    }
  );

/**
 * Round Robin Configuration
 */
export const RoundRobinConfigSchema = z.object({
  time_quantum: z.number().int().positive('Time quantum must be positive'),
});

/**
 * CFS Configuration
 */
export const CfsConfigSchema = z.object({
  min_granularity: z.number().int().positive('Minimum granularity must be positive'),
});

/**
 * Comparison harness Configuration
 */
export const ComparisonConfigSchema = z.object({
  policies: z.array(PolicyIdSchema).min(1, 'At least one policy is required'),
});

/**
 * Logging Configuration
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

/**
 * Complete simulator configuration
 */
export const SimulatorConfigSchema = z.object({
  mlfq: MlfqConfigSchema,
  round_robin: RoundRobinConfigSchema,
  cfs: CfsConfigSchema,
  comparison: ComparisonConfigSchema,
  logging: LoggingConfigSchema,
});

export type PolicyId = z.infer<typeof PolicyIdSchema>;
