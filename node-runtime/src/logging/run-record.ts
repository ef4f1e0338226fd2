import type { WorkflowResult } from '../types/index.js';
import { RunLogger } from './run-logger.js';
import { writeResultSummary } from './summary-writer.js';

export interface RunRecordPaths {
  logPath: string;
  summaryPath: string;
}

/** Appends the result to `runs.jsonl` and rewrites `summary.md` for the latest run. */
export async function recordRun(runDir: string, result: WorkflowResult): Promise<RunRecordPaths> {
  const runLogger = new RunLogger(runDir);
  await runLogger.logResult(result);
  const summaryPath = await writeResultSummary(runDir, result);
  return { logPath: runLogger.getLogPath(), summaryPath };
}
