/**
 * Environment variable validation — fail-fast on startup.
 *
 * Every variable has a default; a value that is present but malformed
 * throws on import.
 */

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function positiveInteger(key: string, fallback: number): number {
  const raw = process.env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid environment variable ${key}: expected a positive integer, got "${raw}".`)
  }
  return value
}

export const env = {
  PORT: positiveInteger('PORT', 4000),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(','),
  MAX_RESPONSE_SAMPLES: positiveInteger('MAX_RESPONSE_SAMPLES', 16384),
} as const
