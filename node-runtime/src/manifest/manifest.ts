import type { ManifestRecord, WorkflowManifest } from '../types/index.js';
import { DEFAULT_MANIFEST_VERSION, type ManifestDocument } from '../schemas/index.js';

export interface ManifestInit {
  workflowName: string;
  description: string;
  version?: string;
  recordedAt?: string;
  recordedBy?: string;
  inputParameters?: Record<string, string>;
  outputArtifacts?: string[];
  dependencies?: string[];
  recordingPath?: string;
}

export function createManifest(init: ManifestInit): WorkflowManifest {
  return {
    workflowName: init.workflowName,
    description: init.description,
    version: init.version ?? DEFAULT_MANIFEST_VERSION,
    recordedAt: init.recordedAt ?? new Date().toISOString(),
    recordedBy: init.recordedBy ?? '',
    inputParameters: { ...init.inputParameters },
    outputArtifacts: [...(init.outputArtifacts ?? [])],
    dependencies: [...(init.dependencies ?? [])],
    recordingPath: init.recordingPath ?? '',
  };
}

export function manifestToRecord(manifest: WorkflowManifest): ManifestRecord {
  return {
    workflow_name: manifest.workflowName,
    description: manifest.description,
    version: manifest.version,
    recorded_at: manifest.recordedAt,
    recorded_by: manifest.recordedBy,
    input_parameters: { ...manifest.inputParameters },
    output_artifacts: [...manifest.outputArtifacts],
    dependencies: [...manifest.dependencies],
    recording_path: manifest.recordingPath,
  };
}

export function manifestFromDocument(doc: ManifestDocument): WorkflowManifest {
  return {
    workflowName: doc.workflow_name,
    description: doc.description,
    version: doc.version,
    recordedAt: doc.recorded_at,
    recordedBy: doc.recorded_by,
    inputParameters: doc.input_parameters,
    outputArtifacts: doc.output_artifacts,
    dependencies: doc.dependencies,
    recordingPath: doc.recording_path,
  };
}

/** Names declared in `inputParameters` that `supplied` does not provide. */
export function missingParameters(
  manifest: WorkflowManifest,
  supplied: Record<string, unknown>,
): string[] {
  return Object.keys(manifest.inputParameters).filter((name) => !Object.hasOwn(supplied, name));
}
