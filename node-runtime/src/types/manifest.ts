export interface WorkflowManifest {
  workflowName: string;
  description: string;
  version: string;
  recordedAt: string;
  recordedBy: string;
  /** Required parameter name → type tag. Every key must be supplied at execution. */
  inputParameters: Record<string, string>;
  outputArtifacts: string[];
  dependencies: string[];
  recordingPath: string;
}

/** On-disk shape of `manifest.json`. */
export interface ManifestRecord {
  workflow_name: string;
  description: string;
  version: string;
  recorded_at: string;
  recorded_by: string;
  input_parameters: Record<string, string>;
  output_artifacts: string[];
  dependencies: string[];
  recording_path: string;
}
