import { z } from 'zod';

export const ViewportNameSchema = z.enum(['desktop', 'tablet', 'mobile']);

export const DemoOutputFormatSchema = z.enum(['gif', 'mp4', 'webm']);

export const ScreenshotOptionsSchema = z.object({
  htmlPath: z.string().min(1),
  outputDir: z.string().min(1),
  viewports: z.array(ViewportNameSchema).min(1),
  states: z.array(z.string().min(1)).min(1),
});

export const DemoGenerationOptionsSchema = z.object({
  demoScript: z.string().min(1),
  outputFormat: DemoOutputFormatSchema,
  durationSeconds: z.number().positive(),
  fps: z.number().int().positive(),
  outputPath: z.string().min(1),
});
