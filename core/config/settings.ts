import { z } from 'zod';

const DEFAULT_BASE_API_URL = 'https://api.mining-data.example.com';
const DEFAULT_AUTH_BASE_URL = 'https://identitytoolkit.googleapis.com/v1';
const DEFAULT_REFRESH_BASE_URL = 'https://securetoken.googleapis.com/v1';

const envSchema = z.object({
  MINING_API_KEY: z.string().min(1).default('local-dev-key'),
  MINING_BASE_API_URL: z.string().url().default(DEFAULT_BASE_API_URL),
  MINING_AUTH_URL: z.string().url().optional(),
  MINING_REFRESH_URL: z.string().url().optional(),
  MINING_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120000)
});

export interface ApiConfig {
  apiKey: string;
  baseApiUrl: string;
  authUrl: string;
  refreshUrl: string;
  requestTimeoutMs: number;
}

/**
 * Builds the API configuration from environment variables, falling back to defaults.
 * Throws a ZodError when a provided value is malformed.
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.parse({
    MINING_API_KEY: env.MINING_API_KEY || undefined,
    MINING_BASE_API_URL: env.MINING_BASE_API_URL || undefined,
    MINING_AUTH_URL: env.MINING_AUTH_URL || undefined,
    MINING_REFRESH_URL: env.MINING_REFRESH_URL || undefined,
    MINING_REQUEST_TIMEOUT_MS: env.MINING_REQUEST_TIMEOUT_MS || undefined
  });

  return {
    apiKey: parsed.MINING_API_KEY,
    baseApiUrl: parsed.MINING_BASE_API_URL.replace(/\/+$/, ''),
    authUrl: parsed.MINING_AUTH_URL
      ?? `${DEFAULT_AUTH_BASE_URL}/accounts:signInWithPassword?key=${parsed.MINING_API_KEY}`,
    refreshUrl: parsed.MINING_REFRESH_URL
      ?? `${DEFAULT_REFRESH_BASE_URL}/token?key=${parsed.MINING_API_KEY}`,
    requestTimeoutMs: parsed.MINING_REQUEST_TIMEOUT_MS
  };
}
