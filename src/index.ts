export { Job, createJobs, type JobId } from './core/job.js';
export { computeMetrics } from './core/metrics.js';
export {
  SimulatorError,
  ConfigurationError,
  MetricsError,
  zodErrorToSimulatorError,
  toSimulatorError,
  type SimulatorErrorCode,
  type SimulatorErrorShape,
} from './api/errors.js';

export * from './scheduling/index.js';

export { jainsFairnessIndex } from './reporting/fairness.js';
export {
  compareSchedulers,
  defaultSchedulers,
  formatComparison,
  type ComparisonRow,
} from './reporting/compare.js';

export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  type SimulatorConfig,
  type Environment,
} from './config/loader.js';
export {
  loadWorkloadFile,
  loadScenario,
  loadScenarios,
  parseWorkload,
  type Scenario,
} from './config/workloads.js';
export * as defaults from './config/defaults.js';

export * from './types/index.js';
