export type { WorkflowManifest, ManifestRecord } from './manifest.js';
export type { FailureKind, WorkflowResult, ResultRecord } from './result.js';
export type { ViewportName, ViewportConfig } from './viewport.js';
export type { DemoOutputFormat } from './demo.js';
