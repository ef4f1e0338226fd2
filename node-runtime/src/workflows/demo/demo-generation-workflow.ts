import type { DemoOutputFormat, WorkflowResult } from '../../types/index.js';
import type { Workflow } from '../../runner/workflow.js';
import type { Logger } from '../../logging/logger.js';
import { createLogger } from '../../logging/logger.js';
import { ResultBuilder } from '../../runner/result-builder.js';
import { NotFoundError } from '../../exception/errors.js';
import { DemoGenerationOptionsSchema } from '../../schemas/index.js';
import { pathExists } from '../../utils/fs.js';

export interface DemoGenerationOptions {
  demoScript: string;
  outputFormat?: DemoOutputFormat;
  durationSeconds?: number;
  fps?: number;
  /** Defaults to `demo.<outputFormat>`. */
  outputPath?: string;
  logger?: Logger;
}

/**
 * Turns a demo script into an animated demo. Only input validation exists so
 * far; recording, transcoding and compression are not wired up, so a
 * successful run reports no artifacts.
 */
export class DemoGenerationWorkflow implements Workflow {
  readonly name = 'demo_generation';
  readonly demoScript: string;
  readonly outputFormat: DemoOutputFormat;
  readonly durationSeconds: number;
  readonly fps: number;
  readonly outputPath: string;
  private readonly logger: Logger;

  constructor(options: DemoGenerationOptions) {
    const outputFormat = options.outputFormat ?? 'gif';
    const parsed = DemoGenerationOptionsSchema.parse({
      demoScript: options.demoScript,
      outputFormat,
      durationSeconds: options.durationSeconds ?? 15,
      fps: options.fps ?? 10,
      outputPath: options.outputPath ?? `demo.${outputFormat}`,
    });
    this.demoScript = parsed.demoScript;
    this.outputFormat = parsed.outputFormat;
    this.durationSeconds = parsed.durationSeconds;
    this.fps = parsed.fps;
    this.outputPath = parsed.outputPath;
    this.logger = options.logger ?? createLogger('demo');
  }

  async execute(): Promise<WorkflowResult> {
    const result = new ResultBuilder(this.name);

    try {
      if (!(await pathExists(this.demoScript))) {
        throw new NotFoundError(`Demo script not found: ${this.demoScript}`);
      }

      result.log(`Demo script: ${this.demoScript}`);
      result.log(`Output format: ${this.outputFormat}`);
      result.log(`Duration: ${this.durationSeconds}s @ ${this.fps} fps`);
      result.log(`Output path: ${this.outputPath}`);

      // TODO: record the screen while the script runs, then transcode to outputFormat and compress into outputPath.
      result.log('Demo generation not yet implemented (stub)');

      return result.succeed();
    } catch (err) {
      const failed = result.failWith(err);
      this.logger.warn({ demoScript: this.demoScript, kind: failed.errorKind }, failed.error);
      return failed;
    }
  }
}
