/**
 * CLI: replay a recorded workflow by name → JSONL events on stdout.
 *
 * Usage: npx tsx node-runtime/src/cli/run-workflow.ts --name viewer_screenshots \
 *          --params '{"html_path":"viewer.html"}'
 *
 * Each result is also appended to `<recordings-dir>/.runs/runs.jsonl`, and
 * `<recordings-dir>/.runs/summary.md` describes the latest run.
 */

import { join } from 'node:path';
import { loadConfig } from '../config/config.js';
import { createLogger } from '../logging/logger.js';
import { recordRun } from '../logging/run-record.js';
import { describeError } from '../exception/errors.js';
import { WorkflowExecutor } from '../runner/workflow-executor.js';
import { resultToRecord } from '../runner/result-builder.js';
import { parseRunWorkflowArgs } from './args.js';

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  const args = parseRunWorkflowArgs(argv);
  const recordingsDir = args.recordingsDir ?? config.recordingsDir;

  emit({ type: 'run_start', workflow: args.name, recordingsDir });

  const executor = new WorkflowExecutor({
    workflowName: args.name,
    parameters: args.params,
    recordingsDir,
    logger: createLogger('executor', config.logLevel),
  });
  const result = await executor.execute();

  const { summaryPath } = await recordRun(join(recordingsDir, '.runs'), result);
  emit({ type: 'run_complete', ...resultToRecord(result), summary: summaryPath });

  return result.success ? 0 : 1;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    emit({ type: 'run_error', error: describeError(err) });
    process.exitCode = 2;
  },
);
