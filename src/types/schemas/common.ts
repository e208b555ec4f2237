/**
 * Common Zod schema primitives for the scheduling simulator
 */

import { z } from 'zod';

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer')
  .safe('Must be a safe integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative')
  .safe('Must be a safe integer');

/**
 * Job identifier (numeric or string label)
 */
export const JobIdSchema = z.union([
  NonNegativeInteger,
  z.string().min(1, 'Job id cannot be empty'),
]);

/**
 * Log level accepted by pino
 */
export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
