import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { WorkflowResult } from '../types/index.js';
import { resultToRecord } from '../runner/result-builder.js';

/** Appends one JSON line per workflow result to `<runDir>/runs.jsonl`. */
export class RunLogger {
  private logPath: string;
  private initialized = false;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'runs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  async logResult(result: WorkflowResult): Promise<void> {
    await this.ensureDir();
    const entry = {
      timestamp: new Date().toISOString(),
      ...resultToRecord(result),
    };
    await appendFile(this.logPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  getLogPath(): string {
    return this.logPath;
  }
}
