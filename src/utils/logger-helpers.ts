/**
 * Logger Helpers
 *
 * Engines log a line per scheduling decision at debug/trace. The context
 * object for those lines is only built when the level is enabled.
 */

import type { Logger } from 'pino';
import type { Job } from '../core/job.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Log with a lazily built context
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param contextBuilder - Only called when `level` is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ time, jobId: job.jobId, level }), 'Dispatch');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}

/**
 * Latest completion time in a run summary (0 when nothing completed)
 */
export function makespan(completedJobs: readonly Job[]): number {
  return completedJobs.reduce((latest, job) => Math.max(latest, job.completionTime ?? 0), 0);
}
