// Prints an admin bearer token for local use.
// Usage: npm run admin:token -- owner@example.com [ttlHours]

import { z } from 'zod';
import { logger } from '../src/config/logger';
import { issueAdminToken } from '../src/services/auth.service';

const argsSchema = z.object({
  email: z.string().email(),
  ttlHours: z.coerce.number().positive().default(12),
});

async function main(): Promise<void> {
  const [email, ttlHours] = process.argv.slice(2);
  const parsed = argsSchema.safeParse({ email, ttlHours });
  if (!parsed.success) {
    logger.error('Usage: npm run admin:token -- <email> [ttlHours]');
    process.exit(1);
  }
  const token = await issueAdminToken(parsed.data.email, Math.round(parsed.data.ttlHours * 3600));
  process.stdout.write(`${token}\n`);
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Could not issue admin token');
  process.exit(1);
});
