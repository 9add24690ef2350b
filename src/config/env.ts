/**
 * Environment Configuration
 *
 * Loads `.env` through dotenv and validates it once. Empty values count
 * as unset, so `ODDS_API_KEY=` in a copied `.env.example` disables the
 * odds connector instead of sending an empty key.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DataValidationError } from '../errors/index.js';

const optionalString = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(120_000),
  ODDS_API_KEY: optionalString,
  ODDS_API_BASE_URL: z.string().url().default('https://api.the-odds-api.com'),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * Validate a raw environment map.
 *
 * @throws DataValidationError naming the first offending variable
 */
export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value;
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? 'env';
    throw new DataValidationError(`Invalid environment variable ${field}: ${issue?.message}`, field);
  }
  return result.data;
}

let cachedEnv: AppEnv | null = null;

/**
 * Process-wide configuration, loaded on first use.
 */
export function getEnv(): AppEnv {
  if (!cachedEnv) {
    loadDotenv();
    cachedEnv = parseEnv(process.env);
  }
  return cachedEnv;
}
