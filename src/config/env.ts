import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).default('info'),
  KNOWLEDGE_DIR: z.string().optional(),
  NOMINATIM_BASE_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  GEOCODER_USER_AGENT: z.string().default('literary-place-resolver/0.1'),
  GEOCODER_REQUEST_DELAY_MS: z.string().default('1000').transform(Number),
  GEOCODER_TIMEOUT_MS: z.string().default('10000').transform(Number),
  GEOCODER_RETRY_ATTEMPTS: z.string().default('3').transform(Number),
  GEOCODER_RETRY_BASE_DELAY_MS: z.string().default('750').transform(Number),
  REDIS_URL: z.string().optional(),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.string().default('5432').transform(Number),
  DB_USER: z.string().default('places'),
  DB_PASSWORD: z.string().default('places_dev_pass'),
  DB_NAME: z.string().default('literary_places'),
  DB_POOL_MAX: z.string().optional().transform((v) => (v ? Number(v) : undefined)),
});

function validateEnv() {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const errors = error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
      throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
    }
    throw error;
  }
}

export const env = validateEnv();
