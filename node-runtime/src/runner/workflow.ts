import type { WorkflowResult } from '../types/index.js';

/**
 * A runnable workflow. All configuration is supplied at construction;
 * `execute()` never rejects, failures come back as `success: false`.
 */
export interface Workflow {
  readonly name: string;
  execute(): Promise<WorkflowResult>;
}
