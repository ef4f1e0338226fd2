import { z } from 'zod';

export const DEFAULT_MANIFEST_VERSION = '1.0.0';

export const ManifestDocumentSchema = z.object({
  workflow_name: z.string().min(1),
  description: z.string(),
  version: z.string().default(DEFAULT_MANIFEST_VERSION),
  recorded_at: z.string().default(() => new Date().toISOString()),
  recorded_by: z.string().default(''),
  input_parameters: z.record(z.string()).default({}),
  output_artifacts: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  recording_path: z.string().default(''),
});

export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;
