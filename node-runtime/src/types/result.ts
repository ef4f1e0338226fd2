export type FailureKind =
  | 'NotFound'
  | 'MissingParameters'
  | 'MalformedManifest'
  | 'ExternalToolUnavailable'
  | 'UnclassifiedFailure';

export interface WorkflowResult {
  readonly success: boolean;
  readonly workflowName: string;
  readonly artifacts: readonly string[];
  readonly logs: readonly string[];
  /** Present iff `success` is false. */
  readonly error?: string;
  readonly errorKind?: FailureKind;
  readonly executionTimeSeconds: number;
}

export interface ResultRecord {
  success: boolean;
  workflow_name: string;
  artifacts: string[];
  logs: string[];
  error: string | null;
  error_kind: FailureKind | null;
  execution_time_seconds: number;
}
