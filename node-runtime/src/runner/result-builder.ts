import type { FailureKind, ResultRecord, WorkflowResult } from '../types/index.js';
import { classifyFailure } from '../exception/classifier.js';
import { describeError } from '../exception/errors.js';

/**
 * Accumulates logs and wall-clock time for one `execute()` call and builds
 * the frozen result at the end.
 */
export class ResultBuilder {
  private readonly logs: string[] = [];
  private readonly startedAt = Date.now();

  constructor(private readonly workflowName: string) {}

  log(line: string): void {
    this.logs.push(line);
  }

  /** Bound `log`, for collaborators that only need to append. */
  get logSink(): (line: string) => void {
    return (line) => this.log(line);
  }

  succeed(artifacts: readonly string[] = []): WorkflowResult {
    return this.build({ success: true, artifacts: Object.freeze([...artifacts]) });
  }

  fail(error: string, kind: FailureKind, artifacts: readonly string[] = []): WorkflowResult {
    const message = error.length > 0 ? error : kind;
    return this.build({
      success: false,
      artifacts: Object.freeze([...artifacts]),
      error: message,
      errorKind: kind,
    });
  }

  /** Failure from a caught error, classified by the error's type. */
  failWith(error: unknown, artifacts: readonly string[] = []): WorkflowResult {
    return this.fail(describeError(error), classifyFailure(error), artifacts);
  }

  private build(
    outcome: Pick<WorkflowResult, 'success' | 'artifacts' | 'error' | 'errorKind'>,
  ): WorkflowResult {
    const result: WorkflowResult = {
      ...outcome,
      workflowName: this.workflowName,
      logs: Object.freeze([...this.logs]),
      executionTimeSeconds: Math.max(0, (Date.now() - this.startedAt) / 1000),
    };
    return Object.freeze(result);
  }
}

export function resultToRecord(result: WorkflowResult): ResultRecord {
  return {
    success: result.success,
    workflow_name: result.workflowName,
    artifacts: [...result.artifacts],
    logs: [...result.logs],
    error: result.error ?? null,
    error_kind: result.errorKind ?? null,
    execution_time_seconds: result.executionTimeSeconds,
  };
}
