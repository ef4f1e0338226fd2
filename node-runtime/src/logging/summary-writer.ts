import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { WorkflowResult } from '../types/index.js';

/** Writes `summary.md` into `dir` and returns its path. */
export async function writeResultSummary(dir: string, result: WorkflowResult): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, 'summary.md');
  await writeFile(path, buildResultSummary(result), 'utf-8');
  return path;
}

export function buildResultSummary(result: WorkflowResult): string {
  const lines: string[] = [
    '# Workflow Summary',
    `- Workflow: ${result.workflowName}`,
    `- Result: ${result.success ? 'Success' : 'Failure'}`,
    `- Duration: ${formatDuration(result.executionTimeSeconds)}`,
    `- Artifacts: ${result.artifacts.length}`,
  ];

  if (!result.success) {
    lines.push('');
    lines.push('## Error');
    lines.push(`- ${result.errorKind ?? 'UnclassifiedFailure'}: ${result.error ?? 'no details'}`);
  }

  if (result.artifacts.length > 0) {
    lines.push('');
    lines.push('## Artifacts');
    for (const artifact of result.artifacts) {
      lines.push(`- ${artifact}`);
    }
  }

  if (result.logs.length > 0) {
    lines.push('');
    lines.push('## Logs');
    result.logs.forEach((log, i) => lines.push(`${i + 1}. ${log}`));
  }

  return lines.join('\n') + '\n';
}

function formatDuration(seconds: number): string {
  const totalSeconds = Math.floor(seconds);
  const minutes = Math.floor(totalSeconds / 60);
  const rest = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(rest).padStart(2, '0')}s`;
}
