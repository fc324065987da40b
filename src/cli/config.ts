/**
 * CLI client configuration.
 *
 * Resolution order: `API_URL` (with `BEARER_TOKEN`) from the environment,
 * then `agents-config.json` beside this file, then the built-in defaults.
 * `BEARER_TOKEN` from the environment always fills a missing token.
 * The environment includes a `.env` file when one is given.
 */
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';

export const DEFAULT_API_URL = 'http://localhost:8080';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('./agents-config.json', import.meta.url));

/** Looked up in the working directory, like `dotenv/config`. */
export const DEFAULT_DOTENV_PATH = '.env';

// ─── Schema ─────────────────────────────────────────────────────

export const cliAgentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
});

export const cliConfigSchema = z.object({
  api_url: z.string().url().default(DEFAULT_API_URL),
  agents: z.array(cliAgentSchema).default([]),
  bearer_token: z.string().min(1).optional(),
});

export type CliAgent = z.infer<typeof cliAgentSchema>;

export interface CliConfig {
  apiUrl: string;
  agents: CliAgent[];
  bearerToken?: string;
}

export const DEFAULT_CLI_CONFIG: CliConfig = {
  apiUrl: DEFAULT_API_URL,
  agents: [{ id: 'Agent-AI', name: 'Agent-AI', description: 'An AI agent that can help users' }],
};

// ─── Loaders ────────────────────────────────────────────────────

export function configFromEnv(env: Record<string, string | undefined>): CliConfig {
  return {
    apiUrl: env['API_URL'] ?? DEFAULT_API_URL,
    agents: [],
    bearerToken: env['BEARER_TOKEN'] || undefined,
  };
}

/**
 * Read a JSON config file. An unreadable or invalid file falls back to the
 * defaults with a warning on stderr.
 */
export function configFromJson(path: string, readFile: (path: string) => string = readUtf8): CliConfig {
  let data: unknown;
  try {
    data = JSON.parse(readFile(path));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`Error loading config from ${path}: ${reason}`);
    return { ...DEFAULT_CLI_CONFIG };
  }

  const parsed = cliConfigSchema.safeParse(data);
  if (!parsed.success) {
    console.error(`Error loading config from ${path}: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    return { ...DEFAULT_CLI_CONFIG };
  }

  return {
    apiUrl: parsed.data.api_url,
    agents: parsed.data.agents,
    bearerToken: parsed.data.bearer_token,
  };
}

/**
 * Lay the variables of a dotenv file under `env`. Variables already set win,
 * as with `dotenv.config()`. A missing file changes nothing.
 */
export function withDotenv(
  env: Record<string, string | undefined>,
  path: string,
  fileExists: (path: string) => boolean = existsSync,
  readFile: (path: string) => string = readUtf8,
): Record<string, string | undefined> {
  if (!fileExists(path)) return env;
  return { ...parseDotenv(readFile(path)), ...env };
}

export interface GetConfigOptions {
  env?: Record<string, string | undefined>;
  /** A dotenv file read into the environment first. */
  dotenvPath?: string;
  configPath?: string;
  fileExists?: (path: string) => boolean;
  readFile?: (path: string) => string;
}

export function getConfig(options: GetConfigOptions = {}): CliConfig {
  const fileExists = options.fileExists ?? existsSync;
  const baseEnv = options.env ?? process.env;
  const env =
    options.dotenvPath === undefined
      ? baseEnv
      : withDotenv(baseEnv, options.dotenvPath, fileExists, options.readFile);
  const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;

  let config: CliConfig;
  if (env['API_URL']) {
    config = configFromEnv(env);
  } else if (fileExists(configPath)) {
    config = configFromJson(configPath, options.readFile);
  } else {
    config = { ...DEFAULT_CLI_CONFIG };
  }

  const envToken = env['BEARER_TOKEN'];
  if (envToken && !config.bearerToken) {
    config.bearerToken = envToken;
  }

  return config;
}

function readUtf8(path: string): string {
  return readFileSync(path, 'utf8');
}
