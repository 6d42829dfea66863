import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const EnvSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    DB_TYPE: z.enum(['postgres', 'better-sqlite3']).default('postgres'),
    DATABASE_URL: z.string().optional(),
    DATABASE_PATH: z.string().default('data/leads.sqlite'),
    DB_SYNCHRONIZE: booleanFlag.optional(),

    STORAGE_BACKEND: z.enum(['local', 's3']).default('local'),
    MEDIA_ROOT: z.string().default('media'),
    MEDIA_URL: z.string().default('/media'),
    S3_BUCKET: z.string().optional(),
    AWS_REGION: z.string().default('us-east-1'),

    FIREBASE_SERVICE_ACCOUNT_KEY: z.string().optional(),
    AWS_SECRET_NAME_FIREBASE: z.string().optional(),

    REFERRAL_BASE_URL: z.string().default('http://localhost:3000/ref'),
    PDF_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  })
  .superRefine((env, ctx) => {
    if (env.DB_TYPE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when DB_TYPE=postgres',
      });
    }
    if (env.STORAGE_BACKEND === 's3' && !env.S3_BUCKET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['S3_BUCKET'],
        message: 'S3_BUCKET is required when STORAGE_BACKEND=s3',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates process environment for ConfigModule. Throws with every
 * offending variable listed so the process never boots half-configured.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
