import OpenAI from 'openai';
import Stripe from 'stripe';
import { env, type IntegrationsMode } from '../config/env';
import { logger } from '../config/logger';
import {
  HostawayAdapter,
  OpenAiLlmAdapter,
  StripePaymentsAdapter,
  StubLlmAdapter,
  StubPaymentsAdapter,
  StubPmsAdapter,
} from './adapters';
import type { ILlmAdapter, IPaymentsAdapter, IPmsAdapter } from './interfaces';

export interface Integrations {
  pms: IPmsAdapter;
  payments: IPaymentsAdapter;
  llm: ILlmAdapter;
}

export function createIntegrations(mode: IntegrationsMode): Integrations {
  if (mode === 'stub') {
    return {
      pms: new StubPmsAdapter(),
      payments: new StubPaymentsAdapter(),
      llm: new StubLlmAdapter(),
    };
  }

  return {
    pms: new HostawayAdapter(env.HOSTAWAY_API_BASE_URL),
    payments: new StripePaymentsAdapter(
      new Stripe(env.STRIPE_SECRET_KEY),
      env.STRIPE_CONNECT_CLIENT_ID,
    ),
    llm: new OpenAiLlmAdapter(new OpenAI({ apiKey: env.OPENAI_API_KEY }), {
      chat: env.OPENAI_CHAT_MODEL,
      summary: env.OPENAI_SUMMARY_MODEL,
      sentiment: env.OPENAI_SENTIMENT_MODEL,
    }),
  };
}

let current: Integrations | null = null;

/** Adapters for the configured INTEGRATIONS_MODE, created on first use. */
export function getIntegrations(): Integrations {
  if (!current) {
    current = createIntegrations(env.INTEGRATIONS_MODE);
    logger.info({ mode: env.INTEGRATIONS_MODE }, 'Integrations initialized');
  }
  return current;
}

/** Replaces some or all adapters (tests swap in configured stubs). */
export function setIntegrations(overrides: Partial<Integrations>): Integrations {
  current = { ...getIntegrations(), ...overrides };
  return current;
}
