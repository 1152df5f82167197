// Run with: npm run db:seed
import { logger } from '../src/config/logger';
import { seedDemo } from '../src/db/seed';

seedDemo().catch((err: unknown) => {
  logger.error({ err }, 'Seed failed');
  process.exit(1);
});
