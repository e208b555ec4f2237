/**
 * Default Configuration Constants
 *
 * Engine defaults used when a constructor receives no explicit option.
 * The YAML configuration overrides these for the comparison harness.
 */

/**
 * MLFQ defaults
 */
export const MLFQ = {
  /** Number of priority levels */
  NUM_QUEUES: 4,

  /** Ticks between priority boosts */
  BOOST_INTERVAL: 1000,

  /** Allotment per level as a multiple of that level's quantum */
  ALLOTMENT_MULTIPLIER: 2,
} as const;

/**
 * Round Robin defaults
 */
export const ROUND_ROBIN = {
  /** Maximum ticks per dispatch */
  TIME_QUANTUM: 2,
} as const;

/**
 * CFS defaults
 */
export const CFS = {
  /** Minimum consecutive ticks per dispatch (1 = re-evaluate every tick) */
  MIN_GRANULARITY: 1,
} as const;

/**
 * Default quantum list: 1, 2, 4, ... ticks
 */
export function defaultTimeQuantums(numQueues: number): number[] {
  return Array.from({ length: numQueues }, (_, level) => 2 ** level);
}

/**
 * Default allotment list: twice each level's quantum
 */
export function defaultTimeAllotments(timeQuantums: readonly number[]): number[] {
  return timeQuantums.map((quantum) => quantum * MLFQ.ALLOTMENT_MULTIPLIER);
}
