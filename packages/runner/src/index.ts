export { writeJsonAtomic, writeTextAtomic } from './atomicWrite.js';
export { ConvergenceLoop, type ConvergenceLoopOptions, type LoopOutcome } from './convergenceLoop.js';
export { FakeLauncher, FakeWorkerProcess, type FakeJobBehavior } from './fakeLauncher.js';
export { SqliteRunHistory, type RunHistory } from './history.js';
export {
  exitCodeFromExitEvent,
  expandArgs,
  SpawnLauncher,
  type ProcessExit,
  type ProcessLauncher,
  type SpawnLauncherOptions,
  type WorkerProcess,
} from './launcher.js';
export {
  loadLoopState,
  saveLoopState,
  type IterationRecord,
  type JobSummary,
  type PersistedLoopState,
} from './loopState.js';
export { PhaseRunner, type PhaseRunnerOptions } from './phaseRunner.js';
export { loadPromptTemplates, renderTemplate, type PromptName, type PromptTemplates } from './prompts.js';
export { buildReport, renderReportMarkdown, writeReport, type RunReport, type TaskVerdict } from './report.js';
export { createRunLog, type AppendLog } from './runLog.js';
export { HarnessMissingError, ValidationHarness } from './validationHarness.js';
export {
  SENTINEL_EXIT_CODE,
  WorkerPool,
  WorkerPoolError,
  type JobResult,
  type JobStatus,
  type PipelineStage,
  type PoolEvent,
  type WorkerPoolOptions,
} from './workerPool.js';
