import type { WorkflowResult } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import { defaultConfig } from '../config/config.js';
import { MissingParametersError, NotFoundError } from '../exception/errors.js';
import { loadManifest, manifestPath } from '../manifest/store.js';
import { missingParameters } from '../manifest/manifest.js';
import { ResultBuilder } from './result-builder.js';
import { SimulatedReplay, type ReplayEngine } from './replay.js';
import type { Workflow } from './workflow.js';
import { pathExists } from '../utils/fs.js';

export interface WorkflowExecutorOptions {
  workflowName: string;
  parameters?: Record<string, unknown>;
  recordingsDir?: string;
  replay?: ReplayEngine;
  logger?: Logger;
}

/**
 * Loads a recorded workflow's manifest, checks the supplied parameters
 * against it and replays it.
 *
 * ```ts
 * const executor = new WorkflowExecutor({
 *   workflowName: 'viewer_screenshots',
 *   parameters: { html_path: 'viewer.html' },
 * });
 * const result = await executor.execute();
 * ```
 */
export class WorkflowExecutor implements Workflow {
  readonly name: string;
  private readonly parameters: Record<string, unknown>;
  private readonly recordingsDir: string;
  private readonly replayEngine: ReplayEngine;
  private readonly logger: Logger;

  constructor(options: WorkflowExecutorOptions) {
    this.name = options.workflowName;
    this.parameters = { ...options.parameters };
    this.recordingsDir = options.recordingsDir ?? defaultConfig.recordingsDir;
    this.replayEngine = options.replay ?? new SimulatedReplay();
    this.logger = options.logger ?? createLogger('executor');
  }

  async execute(): Promise<WorkflowResult> {
    const result = new ResultBuilder(this.name);

    try {
      const path = manifestPath(this.recordingsDir, this.name);
      if (!(await pathExists(path))) {
        throw new NotFoundError(`Workflow not found: ${this.name}`);
      }

      const manifest = await loadManifest(path);
      result.log(`Loaded workflow: ${manifest.workflowName}`);

      const missing = missingParameters(manifest, this.parameters);
      if (missing.length > 0) {
        throw new MissingParametersError(missing);
      }
      result.log(`Parameters validated: ${JSON.stringify(this.parameters)}`);

      const artifacts = await this.replayEngine.replay(manifest, this.parameters, result.logSink);
      this.logger.info({ workflow: this.name, artifacts: artifacts.length }, 'Workflow replayed');
      return result.succeed(artifacts);
    } catch (err) {
      const failed = result.failWith(err);
      this.logger.warn({ workflow: this.name, kind: failed.errorKind }, failed.error);
      return failed;
    }
  }
}
