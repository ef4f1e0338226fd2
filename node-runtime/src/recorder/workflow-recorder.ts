import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { WorkflowManifest } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { defaultConfig } from '../config/config.js';
import { createManifest } from '../manifest/manifest.js';
import { MANIFEST_FILE, saveManifest, workflowDir } from '../manifest/store.js';
import { NoopCaptureService, type CaptureService } from './capture.js';

export interface WorkflowRecorderOptions {
  name: string;
  description: string;
  outputArtifacts?: string[];
  requiredInputs?: Record<string, string>;
  recordingsDir?: string;
  recordedBy?: string;
  capture?: CaptureService;
  logger?: Logger;
}

/**
 * Records a manually performed workflow into `<recordingsDir>/<name>/` and
 * writes its `manifest.json` when the recording stops.
 *
 * Prefer {@link withRecording}, which guarantees `stop()` runs.
 */
export class WorkflowRecorder {
  readonly name: string;
  private readonly options: WorkflowRecorderOptions;
  private readonly recordingsDir: string;
  private readonly capture: CaptureService;
  private readonly logger: Logger;
  private _manifest: WorkflowManifest | null = null;
  private _recordingPath: string | null = null;

  constructor(options: WorkflowRecorderOptions) {
    this.name = options.name;
    this.options = options;
    this.recordingsDir = options.recordingsDir ?? defaultConfig.recordingsDir;
    this.capture = options.capture ?? new NoopCaptureService();
    this.logger = options.logger ?? createLogger('recorder');
  }

  get manifest(): WorkflowManifest | null {
    return this._manifest;
  }

  /** Directory of the recording; null before `start()`. */
  get recordingPath(): string | null {
    return this._recordingPath;
  }

  async start(): Promise<string> {
    if (this._recordingPath) {
      throw new Error(`Recording "${this.name}" already started`);
    }

    const dir = workflowDir(this.recordingsDir, this.name);
    await mkdir(dir, { recursive: true });

    this._manifest = createManifest({
      workflowName: this.name,
      description: this.options.description,
      recordedBy: this.options.recordedBy,
      inputParameters: this.options.requiredInputs,
      outputArtifacts: this.options.outputArtifacts,
      recordingPath: dir,
    });
    this._recordingPath = dir;

    await this.capture.start(dir);
    this.logger.info({ workflow: this.name, dir }, 'Recording workflow');
    return dir;
  }

  /**
   * Stops capture and writes the manifest. The manifest is written even if
   * the capture service fails to stop; that error is re-thrown afterwards.
   */
  async stop(): Promise<string> {
    if (!this._manifest || !this._recordingPath) {
      throw new Error(`Recording "${this.name}" was not started`);
    }

    const path = join(this._recordingPath, MANIFEST_FILE);
    try {
      await this.capture.stop();
    } finally {
      await saveManifest(this._manifest, path);
      this.logger.info({ workflow: this.name, manifest: path }, 'Workflow recorded');
    }
    return path;
  }
}

/**
 * Runs `body` inside a recording. The manifest is persisted on every exit
 * path, including when `body` throws.
 */
export async function withRecording<T>(
  options: WorkflowRecorderOptions,
  body: (recorder: WorkflowRecorder) => Promise<T> | T,
): Promise<T> {
  const recorder = new WorkflowRecorder(options);
  await recorder.start();
  try {
    return await body(recorder);
  } finally {
    await recorder.stop();
  }
}
