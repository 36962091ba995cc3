import { z } from 'zod';

/**
 * Environment variables read through ConfigService.
 * Values arrive as strings; numeric keys are coerced.
 */
export const EnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_DATABASE: z.string().default('air_quality'),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  // Zone-less CSV timestamps are stored as UTC, so clock time is offset 0
  ANALYTICS_UTC_OFFSET_MINUTES: z.coerce
    .number()
    .int()
    .min(-720)
    .max(840)
    .default(0),
  INGESTION_BATCH_SIZE: z.coerce.number().int().positive().default(1000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * ConfigModule `validate` hook: fails startup listing every bad key
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
