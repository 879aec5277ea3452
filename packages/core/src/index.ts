export {
  encodePathSegment,
  getCheckPath,
  getGuidancePath,
  getJobLogPath,
  getPlanPath,
  getRunPaths,
  getValidationLogPath,
  iterationDirName,
  makeRunId,
  type RunPaths,
} from './paths.js';

export {
  groupByCategory,
  loadManifest,
  ManifestError,
  parseManifestObject,
  parseManifestText,
  type ManifestErrorCode,
  type TaskDescriptor,
} from './manifest.js';

export {
  createInitialContext,
  isPhaseName,
  parsePhaseName,
  phaseNames,
  setupPhases,
  withPhase,
  workPhases,
  type JobSpec,
  type JobSpecBuilder,
  type PhaseContext,
  type PhaseName,
  type SetupPhase,
  type WorkPhase,
} from './phases.js';

export {
  attributeFailures,
  formatValidationCounts,
  isConverged,
  parseValidationReport,
  unusableValidation,
  ValidationReportError,
  type FailedItem,
  type ValidationResult,
} from './validation.js';

export {
  ConvergenceEngine,
  describeLoopState,
  isDone,
  LoopStateError,
  type DoneOutcome,
  type LoopEvent,
  type LoopState,
  type LoopStateErrorCode,
} from './convergence.js';

export {
  ConfigError,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_WORKERS,
  loadConfigFromFile,
  MAX_WORKERS,
  parseConfigObject,
  resolveConfigPath,
  validateMaxIterations,
  validateWorkers,
  type ConfigErrorCode,
  type ConfigOverrides,
  type LoopConfig,
  type ValidationCommandConfig,
  type WorkerCommandConfig,
} from './config.js';
