import { z, ZodError } from 'zod';

const optionalSecret = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().min(1).optional()
);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Data storage
  DATA_DIR: z.string().default('./data'),
  SQLITE_DB_PATH: z.string().default('./data/campaigns.db'),
  SEED_COMPANY_DIRECTORY: booleanFlag,

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Generation backend
  LLM_PROVIDER: z.enum(['openai', 'anthropic', 'google']).default('openai'),
  LLM_MODEL: optionalSecret,
  OPENAI_API_KEY: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().regex(/^sk-/).optional()
  ),
  ANTHROPIC_API_KEY: optionalSecret,
  GOOGLE_API_KEY: optionalSecret,

  // Notifications
  RESEND_API_KEY: optionalSecret,
  NOTIFY_FROM: z.string().default('Campaign Suggestions <notifications@example.com>'),
  NOTIFY_DEFAULT_RECIPIENT: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().email().optional()
  ),

  // Pipeline policy
  GENERATION_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1, { message: 'GENERATION_MAX_ATTEMPTS must be at least 1' })
    .default(3),
  GENERATION_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(1000),
  GENERATION_BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(8000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(60000),
  GENERATION_SUGGESTION_COUNT: z.coerce.number().int().min(1).max(10).default(3),
  NOTIFY_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),
  PERSISTENCE_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),

  // Recovery of interrupted jobs
  RECOVERY_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'RECOVERY_INTERVAL_MINUTES must be at least 1' })
    .max(59, { message: 'RECOVERY_INTERVAL_MINUTES must be at most 59' })
    .default(5),
  RECOVERY_STALE_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'RECOVERY_STALE_MINUTES must be at least 1' })
    .default(10),

  // Rate limiting (job submissions)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(30),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment record; throws ZodError on invalid input
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
