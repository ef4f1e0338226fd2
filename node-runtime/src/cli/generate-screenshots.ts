/**
 * CLI: screenshot an HTML page across viewports and UI states, and
 * optionally commit the results to a PR branch.
 *
 * Usage:
 *   npx tsx node-runtime/src/cli/generate-screenshots.ts \
 *     --html-path benchmark_results/viewer.html --output-dir screenshots \
 *     [--use-playwright] [--commit-to-pr]
 */

import { loadConfig } from '../config/config.js';
import { createLogger } from '../logging/logger.js';
import { describeError } from '../exception/errors.js';
import { ScreenshotWorkflow } from '../workflows/screenshot/screenshot-workflow.js';
import { PlaywrightRenderer } from '../workflows/screenshot/playwright-renderer.js';
import { StubRenderer } from '../workflows/screenshot/stub-renderer.js';
import { parseScreenshotArgs } from './args.js';
import { GitPublisher } from './git-publisher.js';

const RULE = '='.repeat(60);

async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  const args = parseScreenshotArgs(argv);

  const workflow = new ScreenshotWorkflow({
    htmlPath: args.htmlPath,
    outputDir: args.outputDir,
    viewports: args.viewports,
    states: args.states,
    renderer: args.usePlaywright ? new PlaywrightRenderer() : new StubRenderer(),
    logger: createLogger('screenshot', config.logLevel),
  });

  console.log(RULE);
  console.log('Screenshot Workflow');
  console.log(RULE);
  console.log(`HTML: ${args.htmlPath}`);
  console.log(`Output: ${args.outputDir}`);
  console.log(`Viewports: ${args.viewports.join(', ')}`);
  console.log(`States: ${args.states.join(', ')}`);
  console.log(`Implementation: ${args.usePlaywright ? 'Playwright' : 'Stub'}`);
  console.log();

  console.log('Executing workflow...');
  const result = await workflow.execute();

  console.log('\nWorkflow completed!');
  console.log(`Success: ${result.success}`);

  if (result.success) {
    console.log(`\nGenerated ${result.artifacts.length} screenshots:`);
    for (const artifact of result.artifacts) {
      console.log(`  - ${artifact}`);
    }

    if (args.commitToPr && result.artifacts.length > 0) {
      console.log('\nCommitting to PR branch...');
      const publisher = new GitPublisher(undefined, createLogger('git', config.logLevel));
      const published = await publisher.commitAndPush(result.artifacts, args.branch);
      console.log(
        published.ok ? `\nCommitted and pushed to branch: ${args.branch}` : `\n${published.error}`,
      );
    }
  } else {
    console.log(`\nError: ${result.error}`);
  }

  if (result.logs.length > 0) {
    console.log('\nExecution logs:');
    for (const line of result.logs) {
      console.log(`  ${line}`);
    }
  }

  return result.success ? 0 : 1;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 2;
  },
);
