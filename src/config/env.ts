import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/postmark.errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_POSTMARK_API_URL = 'https://api.postmarkapp.com';
export const DEFAULT_TIMEOUT_MS = 30000;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  POSTMARK_SERVER_TOKEN: z.string().trim().default(''),
  POSTMARK_API_URL: z.string().url().default(DEFAULT_POSTMARK_API_URL),
  POSTMARK_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
});

const logLevelSchema = z.enum(LOG_LEVELS);

export interface Config {
  postmarkServerToken: string;
  postmarkApiUrl: string;
  postmarkTimeoutMs: number;
}

export interface LogSettings {
  level: LogLevel;
  environment: string;
  pretty: boolean;
}

let envFileLoaded = false;

/**
 * Loads .env from the project root once. Variables already set win.
 */
export function loadEnvFile(): void {
  if (envFileLoaded) {
    return;
  }
  envFileLoaded = true;
  dotenv.config({ path: resolve(__dirname, '../../.env') });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    postmarkServerToken: values.POSTMARK_SERVER_TOKEN,
    postmarkApiUrl: values.POSTMARK_API_URL,
    postmarkTimeoutMs: values.POSTMARK_TIMEOUT_MS,
  };
}

/**
 * Logger settings never fail: an unknown LOG_LEVEL falls back to info,
 * and pretty printing needs NODE_ENV=development.
 */
export function resolveLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const level = logLevelSchema.safeParse(env.LOG_LEVEL);
  const environment = env.NODE_ENV || 'production';
  return {
    level: level.success ? level.data : 'info',
    environment,
    pretty: environment === 'development',
  };
}

/**
 * Reads POSTMARK_* from the environment (and .env) at call time
 */
export function getConfig(): Config {
  loadEnvFile();
  return loadConfig();
}
