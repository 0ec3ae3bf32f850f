import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';

export const TANDEM_DIR = path.join(os.homedir(), '.tandem');
export const CONFIG_FILE = path.join(TANDEM_DIR, 'config.json');

const RetrySchema = z.object({
  maxAttempts: z.number().int().positive(),
  baseDelayMs: z.number().nonnegative(),
  maxDelayMs: z.number().nonnegative(),
  jitterFactor: z.number().min(0).max(1).optional()
});

const ConfigSchema = z.object({
  llm: z
    .object({
      provider: z.literal('openai').default('openai'),
      model: z.string().min(1).default('gpt-4o-mini'),
      baseUrl: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().positive().optional(),
      rateLimit: z.object({ maxPerMinute: z.number().int().positive() }).optional(),
      retry: RetrySchema.optional()
    })
    .default({}),
  runner: z
    .object({
      maxSteps: z.number().int().positive().default(20),
      recordTo: z.string().min(1).optional()
    })
    .default({}),
  logger: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      format: z.enum(['pretty', 'json']).default('pretty')
    })
    .default({})
});

export type TandemConfig = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

function validate(raw: unknown, source: string): TandemConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

async function readConfigFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`Cannot read ${filePath}: ${errorMessage(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`);
  }
}

function overlayEnv(config: TandemConfig, env: Env): Record<string, unknown> {
  const llm = { ...config.llm };
  const runner = { ...config.runner };
  const logger: Record<string, unknown> = { ...config.logger };

  const {
    TANDEM_MODEL: model,
    TANDEM_BASE_URL: baseUrl,
    TANDEM_API_KEY: tandemKey,
    OPENAI_API_KEY: openaiKey,
    TANDEM_MAX_STEPS: maxSteps,
    TANDEM_RECORD_TO: recordTo,
    TANDEM_LOG_LEVEL: level,
    TANDEM_LOG_FORMAT: format
  } = env;

  if (model) llm.model = model;
  if (baseUrl) llm.baseUrl = baseUrl;
  const apiKey = tandemKey || openaiKey;
  if (apiKey) llm.apiKey = apiKey;

  if (maxSteps) runner.maxSteps = Number(maxSteps);
  if (recordTo) runner.recordTo = recordTo;

  if (level) logger['level'] = level;
  if (format) logger['format'] = format;

  return { llm, runner, logger };
}

/**
 * Loads `~/.tandem/config.json` (or `filePath`), then lets `TANDEM_*` and
 * `OPENAI_API_KEY` variables override it. A missing file means defaults.
 */
export async function loadConfig(filePath: string = CONFIG_FILE, env: Env = process.env): Promise<TandemConfig> {
  const fromFile = validate(await readConfigFile(filePath), filePath);
  const merged = overlayEnv(fromFile, env);
  // Environment values are re-checked against the same schema.
  return validate(merged, `${filePath} + environment`);
}
