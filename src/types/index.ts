/**
 * Main type exports for the scheduling simulator
 */

export * from './scheduling.js';
export * from './schemas/index.js';
