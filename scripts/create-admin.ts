import { z } from 'zod';
import { env } from '../src/config/environment';
import { logger } from '../src/config/logger';
import { getSupabaseClient } from '../src/config/database';
import { AdminRepository } from '../src/repositories/admin.repository';
import { AuthService } from '../src/services/auth.service';
import { NotificationDispatcher } from '../src/services/notification.service';

/**
 * Create the first staff account, which can then add others through the API
 *
 * Usage: npm run admin:create -- <email> <password> <first name> <last name>
 */
const argsSchema = z.tuple([
  z.string().email(),
  z.string().min(8).max(72),
  z.string().trim().min(1),
  z.string().trim().min(1),
]);

async function main(): Promise<void> {
  const parsed = argsSchema.safeParse(process.argv.slice(2));

  if (!parsed.success) {
    console.error('Usage: npm run admin:create -- <email> <password> <first name> <last name>');
    console.error(parsed.error.errors.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`).join('\n'));
    process.exit(1);
  }

  const [email, password, firstName, lastName] = parsed.data;

  // No mail is sent when creating an account
  const authService = new AuthService(
    new AdminRepository(getSupabaseClient()),
    new NotificationDispatcher(null, { maxAttempts: 1, retryDelayMs: 0 }),
    {
      jwtSecret: env.JWT_SECRET,
      jwtExpiresInSeconds: env.JWT_EXPIRES_IN_SECONDS,
      otpTtlMinutes: env.OTP_TTL_MINUTES,
    }
  );

  const admin = await authService.createAdmin({ email, password, firstName, lastName });
  console.log(`✅ Staff account created: ${admin.email} (id ${admin.id})`);
}

main().catch((error: unknown) => {
  logger.error('Failed to create staff account', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
