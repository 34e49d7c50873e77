import { z } from 'zod';
import { ValidationError } from '@shepherd/shared';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_REFRESH_SECRET: z.string().min(1).optional(),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(86400),
  RESEND_API_KEY: z.string().min(1).optional(),
  EMAIL_FROM: z.string().default('noreply@example.org'),
  SMS_PROVIDER: z.enum(['hubtel', 'textme', 'generic']).default('generic'),
  SMS_API_URL: z.string().url().optional(),
  SMS_API_KEY: z.string().optional(),
  SMS_API_SECRET: z.string().optional(),
  SMS_SENDER_ID: z.string().default('CHURCH'),
});

export type AppConfig = z.infer<typeof envSchema>;

let cached: AppConfig | null = null;

/** Parsed once per process; blank variables count as unset. */
export function getConfig(): AppConfig {
  if (!cached) {
    const env = Object.fromEntries(
      Object.entries(process.env).filter(([, value]) => value !== undefined && value !== ''),
    );
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid environment configuration',
        parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
      );
    }
    cached = parsed.data;
  }
  return cached;
}

export function resetConfig(): void {
  cached = null;
}

/** Token signing refuses to run without secrets rather than fall back to a default. */
export function requireSecret(name: 'JWT_SECRET' | 'JWT_REFRESH_SECRET'): string {
  const value = getConfig()[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}
