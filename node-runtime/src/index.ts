export type {
  WorkflowManifest,
  ManifestRecord,
  FailureKind,
  WorkflowResult,
  ResultRecord,
  ViewportName,
  ViewportConfig,
  DemoOutputFormat,
} from './types/index.js';
export * from './schemas/index.js';

export {
  WorkflowError,
  NotFoundError,
  MissingParametersError,
  MalformedManifestError,
  ExternalToolUnavailableError,
  describeError,
} from './exception/errors.js';
export { classifyFailure } from './exception/classifier.js';

export { defaultConfig, loadConfig, resolveConfig, RuntimeConfigSchema } from './config/config.js';
export type { RuntimeConfig, LogLevel } from './config/config.js';
export { createLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
export { RunLogger } from './logging/run-logger.js';
export { buildResultSummary, writeResultSummary } from './logging/summary-writer.js';
export { recordRun } from './logging/run-record.js';
export type { RunRecordPaths } from './logging/run-record.js';

export { createManifest, manifestToRecord, manifestFromDocument, missingParameters } from './manifest/manifest.js';
export type { ManifestInit } from './manifest/manifest.js';
export { saveManifest, loadManifest, manifestPath, workflowDir, MANIFEST_FILE } from './manifest/store.js';

export { WorkflowRecorder, withRecording } from './recorder/workflow-recorder.js';
export type { WorkflowRecorderOptions } from './recorder/workflow-recorder.js';
export { NoopCaptureService } from './recorder/capture.js';
export type { CaptureService } from './recorder/capture.js';

export type { Workflow } from './runner/workflow.js';
export { ResultBuilder, resultToRecord } from './runner/result-builder.js';
export { WorkflowExecutor } from './runner/workflow-executor.js';
export type { WorkflowExecutorOptions } from './runner/workflow-executor.js';
export { SimulatedReplay, SIMULATED_REPLAY_DELAY_MS } from './runner/replay.js';
export type { ReplayEngine } from './runner/replay.js';
export { substituteParameters } from './runner/template.js';

export * from './workflows/screenshot/index.js';
export { DemoGenerationWorkflow } from './workflows/demo/demo-generation-workflow.js';
export type { DemoGenerationOptions } from './workflows/demo/demo-generation-workflow.js';

export { GitPublisher, execCommand, DEFAULT_BRANCH } from './cli/git-publisher.js';
export type { CommandRunner, PublishResult } from './cli/git-publisher.js';
