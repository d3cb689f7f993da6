// ============================================
// VALLEY ECONOMY - Environment Configuration
// ============================================

import { z } from 'zod';

// Custom coerce helpers
const coerceNumber = z.coerce.number();
const coerceBoolean = z.string().transform(v => v === 'true');

const envSchema = z.object({
  // Server
  PORT: coerceNumber.int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Simulation
  TICK_INTERVAL_MS: coerceNumber.int().positive().default(1000),
  RNG_SEED: coerceNumber.int().optional(),
  GAME_CONFIG_PATH: z.string().optional(),
  AUTO_START: coerceBoolean.default('false'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = loadEnv();

export function isDevelopment(): boolean {
  return env.NODE_ENV === 'development';
}

export function isProduction(): boolean {
  return env.NODE_ENV === 'production';
}
