import { z } from 'zod';

export const FailureKindSchema = z.enum([
  'NotFound',
  'MissingParameters',
  'MalformedManifest',
  'ExternalToolUnavailable',
  'UnclassifiedFailure',
]);

export const WorkflowResultSchema = z
  .object({
    success: z.boolean(),
    workflowName: z.string(),
    artifacts: z.array(z.string()),
    logs: z.array(z.string()),
    error: z.string().optional(),
    errorKind: FailureKindSchema.optional(),
    executionTimeSeconds: z.number().nonnegative(),
  })
  .refine((r) => (r.success ? r.error === undefined : (r.error ?? '').length > 0), {
    message: 'a failed result needs an error message and a successful one must not carry one',
    path: ['error'],
  });
