export { ManifestDocumentSchema, DEFAULT_MANIFEST_VERSION } from './manifest.schema.js';
export type { ManifestDocument } from './manifest.schema.js';
export { FailureKindSchema, WorkflowResultSchema } from './result.schema.js';
export {
  ViewportNameSchema,
  DemoOutputFormatSchema,
  ScreenshotOptionsSchema,
  DemoGenerationOptionsSchema,
} from './options.schema.js';
