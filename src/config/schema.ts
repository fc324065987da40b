/**
 * Zod schema for the gateway's environment settings.
 * Empty strings count as unset so a blank line in `.env` falls back to the default.
 */
import { z } from 'zod';

const optionalString = z.string().min(1).optional();

// ─── Environment ────────────────────────────────────────────────

export const settingsEnvSchema = z.object({
  MODE: z.enum(['dev', 'prod', 'test']).default('dev'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  CORS_ORIGIN: optionalString,

  LLM_PROVIDER: z.enum(['openai', 'lmstudio', 'ollama']).default('lmstudio'),
  LLM_MODEL: z.string().min(1, 'Model identifier cannot be empty').default('dolphin3.0-llama3.1-8b'),
  LLM_BASE_URL: z.string().url('Invalid base URL format').optional(),
  LLM_API_KEY_ENV_VAR: optionalString,
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.5),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(1024),

  AGENT_MAX_STEPS: z.coerce.number().int().positive().max(50, 'Max steps cannot exceed 50').default(10),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive('Timeout must be a positive integer').default(60_000),
});

export type SettingsEnv = z.infer<typeof settingsEnvSchema>;
