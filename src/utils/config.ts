import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigValidationError } from '../core/errors';

export const CONFIG_FILE_NAME = 'resilient-ui.config.json';

const ThresholdsSchema = z
  .object({
    critical: z.number().min(0).max(1).default(0.5),
    emergency: z.number().min(0).max(1).default(0.3),
    degraded: z.number().min(0).max(1).default(0.1)
  })
  .default({});

export const EngineConfigSchema = z.object({
  maxRetryAttempts: z.number().int().min(0).max(20).default(3),
  glassMaxRetryAttempts: z.number().int().min(0).max(20).default(3),
  retryDelayMs: z.number().int().min(0).max(60000).default(500),
  maxCrashReports: z.number().int().min(1).max(10000).default(50),
  recentReportLimit: z.number().int().min(1).max(10000).default(50),
  domainKeywords: z.array(z.string().min(1)).default(['settings', 'glass']),
  thresholds: ThresholdsSchema,
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn')
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type HealthThresholds = EngineConfig['thresholds'];

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Merge a partial configuration over the defaults.
 */
export function resolveConfig(input: EngineConfigInput = {}, source = 'inline config'): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigValidationError(source, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load configuration from a JSON file. Without an explicit path the working
 * directory is searched for resilient-ui.config.json; if none exists the
 * defaults are returned.
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<EngineConfig> {
  const target = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);

  if (!(await fs.pathExists(target))) {
    if (configPath) {
      throw new ConfigValidationError(target, ['file does not exist']);
    }
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(target);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(target, [`not valid JSON (${reason})`]);
  }

  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(target, formatIssues(parsed.error));
  }
  return parsed.data;
}
