/**
 * Simulator error utilities.
 *
 * Provides a consistent error type for every public entry point and
 * helpers to convert lower-level validation errors into SimulatorError
 * instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Simulator error codes surfaced to API consumers.
 */
export type SimulatorErrorCode =
  | 'ConfigurationError'
  | 'EmptyResult'
  | 'InvariantViolation'
  | 'UnknownError';

/**
 * Plain shape of a simulator error (for JSON output).
 */
export interface SimulatorErrorShape {
  code: SimulatorErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base error raised by the simulator.
 */
export class SimulatorError extends Error implements SimulatorErrorShape {
  public readonly code: SimulatorErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SimulatorErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SimulatorError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): SimulatorErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid engine options, job specifications or configuration files.
 * Raised at construction time and never retried.
 */
export class ConfigurationError extends SimulatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ConfigurationError', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Metrics could not be derived from a completed-job collection.
 */
export class MetricsError extends SimulatorError {
  constructor(
    code: Extract<SimulatorErrorCode, 'EmptyResult' | 'InvariantViolation'>,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'MetricsError';
  }
}

/**
 * Convert Zod validation error to ConfigurationError
 *
 * The message names the first failing field; every issue is kept in
 * `details.issues`.
 *
 * @example
 * ```typescript
 * const result = JobSpecSchema.safeParse({ jobId: 1, arrivalTime: 0, burstTime: 0 });
 * if (!result.success) {
 *   throw zodErrorToSimulatorError(result.error);
 * }
 * // Throws: "Validation error on field 'burstTime': Burst time must be positive"
 * ```
 */
export function zodErrorToSimulatorError(error: ZodError, context?: string): ConfigurationError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const reason = firstIssue ? firstIssue.message : 'Invalid value';
  const prefix = context ? `${context}: ` : '';

  return new ConfigurationError(`${prefix}Validation error on field '${field}': ${reason}`, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}

/**
 * Map unknown errors into SimulatorError instances.
 */
export function toSimulatorError(error: unknown): SimulatorError {
  if (error instanceof SimulatorError) {
    return error;
  }

  if (error instanceof Error) {
    return new SimulatorError('UnknownError', error.message);
  }

  return new SimulatorError('UnknownError', String(error));
}
