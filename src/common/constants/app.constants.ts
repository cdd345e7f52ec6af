// Signing secrets
export const secrets = {
  KEY_SIZE_BYTES: 32,
} as const;

// Token lifetimes
export const tokenLifetime = {
  YEAR_MS: 365 * 24 * 60 * 60 * 1000,
  EMBEDDED_CLIENT_YEARS: 99,
  NEVER_EXPIRES: '0',
} as const;

// Redis keys (relative to the configured prefix)
export const redisKeys = {
  SETTINGS: 'settings',
  USER: (userId: number) => `user:${userId}`,
} as const;

// Log levels, most to least severe
export const logLevels = ['error', 'warn', 'log', 'debug', 'verbose'] as const;
