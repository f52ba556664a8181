// ============================================
// DEADZONE - Environment Configuration
// ============================================

import { z } from 'zod';

// Custom coerce helpers
const coerceNumber = z.coerce.number();
const coerceBoolean = z.string().transform(v => v === 'true');

const envSchema = z.object({
  // Server
  PORT: coerceNumber.default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGINS: z
    .string()
    .default('')
    .transform(v => v.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Database
  DB_PATH: z.string().default('./deadzone.db'),
  WORLD_FILE: z.string().default('./data/world.json'),

  // Auth
  JWT_SECRET: z.string().min(32).default('development-secret-key-change-in-production'),
  JWT_EXPIRES_IN: z.string().regex(/^\d+\s*[smhdwy]?$/i, 'e.g. 30d, 12h, 3600').default('30d'),
  ADMIN_KEY: z.string().min(8).default('development-admin-key'),

  // World timing
  TIME_MULTIPLIER: coerceNumber.positive().default(1),
  DAY_LENGTH_SECONDS: coerceNumber.positive().default(1800),
  WORLD_TICK_SECONDS: coerceNumber.positive().default(30),
  DECISION_WINDOW_SECONDS: coerceNumber.positive().default(7),
  OFFLINE_INTERVAL_SECONDS: coerceNumber.positive().default(3600),

  // Combat
  CRITICAL_HIT_CHANCE: coerceNumber.min(0).max(1).default(0.05),
  ALERTED_BONUS: coerceNumber.min(0).default(0.15),
  AMBUSH_BONUS: coerceNumber.min(0).default(1),

  // Rules
  PLAYER_DOWN_POLICY: z.enum(['respawn', 'permadeath']).default('respawn'),
  WORLD_SEED: z.string().default('deadzone'),
  AUTO_START_CLOCK: coerceBoolean.default('true'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = loadEnv();

export function isDevelopment(): boolean {
  return env.NODE_ENV === 'development';
}
