import type { FailureKind } from '../types/index.js';

export class WorkflowError extends Error {
  constructor(
    readonly kind: FailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WorkflowError';
  }
}

export class NotFoundError extends WorkflowError {
  constructor(message: string) {
    super('NotFound', message);
    this.name = 'NotFoundError';
  }
}

export class MissingParametersError extends WorkflowError {
  readonly missing: string[];

  constructor(missing: Iterable<string>) {
    const names = [...missing].sort();
    super('MissingParameters', `Missing required parameters: ${names.join(', ')}`);
    this.name = 'MissingParametersError';
    this.missing = names;
  }
}

export class MalformedManifestError extends WorkflowError {
  constructor(path: string, cause: unknown) {
    super('MalformedManifest', `Malformed manifest at ${path}: ${describeError(cause)}`, { cause });
    this.name = 'MalformedManifestError';
  }
}

export class ExternalToolUnavailableError extends WorkflowError {
  constructor(tool: string, hint: string) {
    super('ExternalToolUnavailable', `${tool} not installed. ${hint}`);
    this.name = 'ExternalToolUnavailableError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
