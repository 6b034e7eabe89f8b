import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val === 'true');

// Whole numbers from the environment; a blank or non-numeric value fails validation
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Define environment variable schema with Zod for type-safe validation
export const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server configuration
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Supabase configuration (required)
  SUPABASE_URL: z.string().url('Invalid Supabase URL'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required'),

  // Staff authentication
  JWT_SECRET: z.string().min(8, 'JWT secret must be at least 8 characters'),
  JWT_EXPIRES_IN_SECONDS: positiveInt(28800),
  OTP_TTL_MINUTES: positiveInt(5),

  // Outgoing mail (delivery is disabled when no API key is configured)
  RESEND_API_KEY: z.string().optional(),
  MAIL_FROM: z.string().default('Lab Equipment Desk <noreply@example.edu>'),
  NOTIFY_MAX_ATTEMPTS: positiveInt(3),
  NOTIFY_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  // Borrow/return behaviour
  PENDING_RETURNS_ENABLED: booleanFlag('false'),
  OVER_RETURN_POLICY: z.enum(['reject', 'truncate']).default('reject'),
  SCAN_DEDUPE_WINDOW_SECONDS: positiveInt(10),

  // Slips and reports
  INSTITUTION_NAME: z.string().default('Laboratory Equipment Borrowing System'),
  TIMEZONE: z.string().default('Asia/Manila'),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // CORS configuration (comma separated, * for any)
  ALLOWED_ORIGINS: z.string().default('*'),
});

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export type Environment = typeof env;

export const SCAN_DEDUPE_WINDOW_MS = env.SCAN_DEDUPE_WINDOW_SECONDS * 1000;

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`📦 Pending returns: ${env.PENDING_RETURNS_ENABLED ? 'staged for approval' : 'applied immediately'}`);
  console.log(`↩️  Over-return policy: ${env.OVER_RETURN_POLICY}`);
}
