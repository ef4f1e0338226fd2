import { z } from 'zod';

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const RuntimeConfigSchema = z.object({
  /** Root directory holding one folder per recorded workflow. */
  recordingsDir: z.string().min(1),
  logLevel: LogLevelSchema,
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const defaultConfig: Readonly<RuntimeConfig> = Object.freeze({
  recordingsDir: 'recordings',
  logLevel: 'info',
});

export function resolveConfig(overrides?: Partial<RuntimeConfig>): Readonly<RuntimeConfig> {
  if (!overrides) return defaultConfig;
  return RuntimeConfigSchema.parse({ ...defaultConfig, ...overrides });
}

/**
 * Build a config from environment variables.
 * `DEVFLOW_RECORDINGS_DIR` and `DEVFLOW_LOG_LEVEL` override the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<RuntimeConfig> {
  const overrides: Partial<RuntimeConfig> = {};
  if (env.DEVFLOW_RECORDINGS_DIR) overrides.recordingsDir = env.DEVFLOW_RECORDINGS_DIR;
  if (env.DEVFLOW_LOG_LEVEL) overrides.logLevel = LogLevelSchema.parse(env.DEVFLOW_LOG_LEVEL);
  return resolveConfig(overrides);
}
