import 'dotenv/config';
import { z } from 'zod';

const emailList = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((email) => email.trim().toLowerCase())
      .filter((email) => email.length > 0),
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  DATABASE_URL: z.string().default('./dev.db'),
  LOG_LEVEL: z
    .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  APP_BASE_URL: z.string().url().default('http://localhost:3000'),
  SESSION_SECRET: z.string().min(8).default('dev-session-secret'),
  ADMIN_EMAILS: emailList,

  // `stub` wires the in-process adapters; `live` talks to Hostaway, Stripe and OpenAI.
  INTEGRATIONS_MODE: z.enum(['live', 'stub']).optional(),

  HOSTAWAY_API_BASE_URL: z.string().url().default('https://api.hostaway.com'),

  OPENAI_API_KEY: z.string().default(''),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_SUMMARY_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_SENTIMENT_MODEL: z.string().default('gpt-4o-mini'),

  STRIPE_SECRET_KEY: z.string().default(''),
  STRIPE_WEBHOOK_SECRET: z.string().default(''),
  STRIPE_CONNECT_CLIENT_ID: z.string().default(''),
  // PMC billing: per-property monthly price and an optional one-time activation fee.
  STRIPE_PRICE_PROPERTY_MONTHLY: z.string().default(''),
  STRIPE_PRICE_ACTIVATION: z.string().default(''),
  PLATFORM_FEE_PERCENT: z.coerce.number().min(0).max(100).default(2),
  PLATFORM_FEE_FLAT_CENTS: z.coerce.number().int().min(0).default(30),

  SYNC_INTERVAL_HOURS: z.coerce.number().positive().default(24),
  SUMMARY_THROTTLE_MINUTES: z.coerce.number().min(0).default(10),
  CHAT_HISTORY_LIMIT: z.coerce.number().int().positive().default(20),
  GUEST_TOKEN_TTL_HOURS: z.coerce.number().positive().default(24 * 14),
});

export type IntegrationsMode = 'live' | 'stub';

const parsed = envSchema.parse(process.env);
const defaultMode: IntegrationsMode = parsed.NODE_ENV === 'production' ? 'live' : 'stub';

export const env = {
  ...parsed,
  INTEGRATIONS_MODE: parsed.INTEGRATIONS_MODE ?? defaultMode,
};
export type Env = typeof env;
