/**
 * Settings loader: validates process environment with Zod and maps it
 * to the camelCase `Settings` object the rest of the gateway consumes.
 */
import { ConfigError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { LLMProviderConfig } from '@/core/types.js';

import { settingsEnvSchema } from './schema.js';

// ─── Types ──────────────────────────────────────────────────────

export interface Settings {
  mode: 'dev' | 'prod' | 'test';
  host: string;
  port: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  corsOrigin?: string;
  provider: LLMProviderConfig;
  agentMaxSteps: number;
  requestTimeoutMs: number;
}

// ─── Loading ────────────────────────────────────────────────────

function withoutBlanks(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load settings from an environment map (defaults to `process.env`).
 * Returns a ConfigError listing every invalid variable instead of throwing.
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env,
): Result<Settings, ConfigError> {
  const parsed = settingsEnvSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(
      new ConfigError(
        `Invalid settings: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
        { issues },
      ),
    );
  }

  const data = parsed.data;
  return ok({
    mode: data.MODE,
    host: data.HOST,
    port: data.PORT,
    logLevel: data.LOG_LEVEL,
    corsOrigin: data.CORS_ORIGIN,
    provider: {
      provider: data.LLM_PROVIDER,
      model: data.LLM_MODEL,
      temperature: data.LLM_TEMPERATURE,
      maxOutputTokens: data.LLM_MAX_OUTPUT_TOKENS,
      apiKeyEnvVar: data.LLM_API_KEY_ENV_VAR,
      baseUrl: data.LLM_BASE_URL,
    },
    agentMaxSteps: data.AGENT_MAX_STEPS,
    requestTimeoutMs: data.REQUEST_TIMEOUT_MS,
  });
}

/** True when the gateway runs in development mode. */
export function isDev(settings: Pick<Settings, 'mode'>): boolean {
  return settings.mode === 'dev';
}
