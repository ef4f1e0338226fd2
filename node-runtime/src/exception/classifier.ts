import { ZodError } from 'zod';
import type { FailureKind } from '../types/index.js';
import { WorkflowError, describeError } from './errors.js';

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof WorkflowError) {
    return error.kind;
  }

  if (error instanceof ZodError || error instanceof SyntaxError) {
    return 'MalformedManifest';
  }

  const code = errorCode(error);
  if (code === 'ERR_MODULE_NOT_FOUND' || code === 'MODULE_NOT_FOUND') {
    return 'ExternalToolUnavailable';
  }
  if (code === 'ENOENT') {
    return 'NotFound';
  }

  const text = describeError(error).toLowerCase();
  if (isMissingExecutable(text)) {
    return 'ExternalToolUnavailable';
  }

  return 'UnclassifiedFailure';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}

function isMissingExecutable(text: string): boolean {
  const patterns = [
    "executable doesn't exist",
    'please run the following command to download new browsers',
  ];
  return patterns.some((p) => text.includes(p));
}
