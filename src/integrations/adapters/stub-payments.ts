import { createBillingCheckoutSchema, createCheckoutSessionSchema } from '../validation';
import type {
  CheckoutSessionResult,
  CreateBillingCheckoutInput,
  CreateCheckoutSessionInput,
  IPaymentsAdapter,
} from '../interfaces/payments';

// Checkout session ids are unique per process, like the processor's.
let issuedSessions = 0;

/**
 * Stub payments adapter. Keeps created checkout sessions in memory and
 * honors idempotency keys the way the processor does. Does NOT charge.
 */
export class StubPaymentsAdapter implements IPaymentsAdapter {
  readonly providerName = 'StubPayments';
  failure: Error | null = null;

  readonly sessions = new Map<string, CreateCheckoutSessionInput & CheckoutSessionResult>();
  readonly billingSessions = new Map<string, CreateBillingCheckoutInput & CheckoutSessionResult>();
  readonly deauthorized: string[] = [];
  private readonly byIdempotencyKey = new Map<string, CheckoutSessionResult>();

  async createCheckoutSession(input: CreateCheckoutSessionInput): Promise<CheckoutSessionResult> {
    if (this.failure) throw this.failure;
    const parsed = createCheckoutSessionSchema.parse(input);

    const existing = this.byIdempotencyKey.get(parsed.idempotencyKey);
    if (existing) return existing;

    const id = `cs_stub_${++issuedSessions}`;
    const result = { id, url: `https://checkout.stub.local/pay/${id}` };
    this.sessions.set(id, { ...parsed, ...result });
    this.byIdempotencyKey.set(parsed.idempotencyKey, result);
    return result;
  }

  async createBillingCheckoutSession(input: CreateBillingCheckoutInput): Promise<CheckoutSessionResult> {
    if (this.failure) throw this.failure;
    const parsed = createBillingCheckoutSchema.parse(input);

    const existing = this.byIdempotencyKey.get(parsed.idempotencyKey);
    if (existing) return existing;

    const id = `cs_stub_${++issuedSessions}`;
    const result = { id, url: `https://checkout.stub.local/subscribe/${id}` };
    this.billingSessions.set(id, { ...parsed, ...result });
    this.byIdempotencyKey.set(parsed.idempotencyKey, result);
    return result;
  }

  buildConnectAuthorizeUrl(state: string, redirectUri: string): string {
    const query = new URLSearchParams({ state, redirect_uri: redirectUri });
    return `https://connect.stub.local/oauth/authorize?${query.toString()}`;
  }

  async exchangeConnectCode(code: string): Promise<{ accountId: string }> {
    if (this.failure) throw this.failure;
    return { accountId: `acct_stub_${code}` };
  }

  async deauthorizeConnectAccount(accountId: string): Promise<void> {
    this.deauthorized.push(accountId);
  }
}
