// Re-export all adapters from a single entry point.
export { HostawayAdapter } from './hostaway';
export { StripePaymentsAdapter } from './stripe';
export { OpenAiLlmAdapter } from './openai';
export { StubPmsAdapter } from './stub-pms';
export { StubPaymentsAdapter } from './stub-payments';
export { StubLlmAdapter } from './stub-llm';
