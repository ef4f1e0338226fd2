import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ViewportName, WorkflowResult } from '../../types/index.js';
import type { Workflow } from '../../runner/workflow.js';
import type { Logger } from '../../logging/logger.js';
import { createLogger } from '../../logging/logger.js';
import { ResultBuilder } from '../../runner/result-builder.js';
import { NotFoundError, describeError } from '../../exception/errors.js';
import { ScreenshotOptionsSchema } from '../../schemas/index.js';
import { pathExists } from '../../utils/fs.js';
import type { ScreenshotRenderer } from './renderer.js';
import { StubRenderer } from './stub-renderer.js';
import { DEFAULT_STATES, DEFAULT_VIEWPORTS, VIEWPORTS, screenshotName } from './viewports.js';

export interface ScreenshotWorkflowOptions {
  htmlPath: string;
  outputDir: string;
  viewports?: ViewportName[];
  states?: string[];
  renderer?: ScreenshotRenderer;
  logger?: Logger;
}

/**
 * Screenshots an HTML page for every viewport × state pair, saved as
 * `<viewport>_<state>.png` in `outputDir`.
 *
 * ```ts
 * const workflow = new ScreenshotWorkflow({
 *   htmlPath: 'benchmark_results/viewer.html',
 *   outputDir: 'screenshots',
 *   states: ['overview', 'task_detail'],
 *   renderer: new PlaywrightRenderer(),
 * });
 * const result = await workflow.execute();
 * ```
 */
export class ScreenshotWorkflow implements Workflow {
  readonly htmlPath: string;
  readonly outputDir: string;
  readonly viewports: readonly ViewportName[];
  readonly states: readonly string[];
  private readonly renderer: ScreenshotRenderer;
  private readonly logger: Logger;

  /** Throws a ZodError for empty viewport or state lists and unknown viewports. */
  constructor(options: ScreenshotWorkflowOptions) {
    const parsed = ScreenshotOptionsSchema.parse({
      htmlPath: options.htmlPath,
      outputDir: options.outputDir,
      viewports: options.viewports ?? [...DEFAULT_VIEWPORTS],
      states: options.states ?? [...DEFAULT_STATES],
    });
    this.htmlPath = parsed.htmlPath;
    this.outputDir = parsed.outputDir;
    this.viewports = parsed.viewports;
    this.states = parsed.states;
    this.renderer = options.renderer ?? new StubRenderer();
    this.logger = options.logger ?? createLogger('screenshot');
  }

  get name(): string {
    return this.renderer.workflowName;
  }

  async execute(): Promise<WorkflowResult> {
    const result = new ResultBuilder(this.name);
    const artifacts: string[] = [];

    try {
      if (!(await pathExists(this.htmlPath))) {
        throw new NotFoundError(`HTML file not found: ${this.htmlPath}`);
      }

      await mkdir(this.outputDir, { recursive: true });
      result.log(`Created output directory: ${this.outputDir}`);

      const session = await this.renderer.open(this.htmlPath, result.logSink);
      try {
        for (const name of this.viewports) {
          const viewport = VIEWPORTS[name];
          result.log(`Setting viewport: ${viewport.name} (${viewport.width}x${viewport.height})`);

          const page = await session.openViewport(viewport);
          try {
            for (const state of this.states) {
              const fileName = screenshotName(name, state);
              const path = join(this.outputDir, fileName);

              await page.enterState(state);
              result.log(`Capturing: ${fileName}`);
              await page.capture(path);
              artifacts.push(path);
            }
          } catch (err) {
            await closeAfterFailure(page, `${name} page`, result);
            throw err;
          }
          await page.close();
        }
      } catch (err) {
        await closeAfterFailure(session, 'renderer session', result);
        throw err;
      }
      await session.close();

      this.logger.info({ outputDir: this.outputDir, count: artifacts.length }, 'Screenshots captured');
      return result.succeed(artifacts);
    } catch (err) {
      const failed = result.failWith(err, artifacts);
      this.logger.warn({ htmlPath: this.htmlPath, kind: failed.errorKind }, failed.error);
      return failed;
    }
  }
}

/** Closes after a failure. A close error is logged, not thrown. */
async function closeAfterFailure(
  target: { close(): Promise<void> },
  label: string,
  result: ResultBuilder,
): Promise<void> {
  try {
    await target.close();
  } catch (err) {
    result.log(`Could not close ${label}: ${describeError(err)}`);
  }
}
