import Stripe from 'stripe';
import { createBillingCheckoutSchema, createCheckoutSessionSchema } from '../validation';
import type {
  CheckoutSessionResult,
  CreateBillingCheckoutInput,
  CreateCheckoutSessionInput,
  IPaymentsAdapter,
} from '../interfaces/payments';

/**
 * Maps a checkout request onto Stripe's Checkout Session params.
 * A configured Stripe price id wins over inline price data.
 */
export function buildCheckoutSessionParams(
  input: CreateCheckoutSessionInput,
): Stripe.Checkout.SessionCreateParams {
  const parsed = createCheckoutSessionSchema.parse(input);
  const { lineItem } = parsed;

  const stripeLineItem: Stripe.Checkout.SessionCreateParams.LineItem = lineItem.priceId
    ? { price: lineItem.priceId, quantity: 1 }
    : {
        price_data: {
          currency: lineItem.currency.toLowerCase(),
          unit_amount: lineItem.amountCents,
          product_data: {
            name: lineItem.name,
            ...(lineItem.description ? { description: lineItem.description } : {}),
          },
        },
        quantity: 1,
      };

  return {
    mode: 'payment',
    line_items: [stripeLineItem],
    success_url: parsed.successUrl,
    cancel_url: parsed.cancelUrl,
    metadata: parsed.metadata,
    ...(parsed.clientReferenceId ? { client_reference_id: parsed.clientReferenceId } : {}),
    payment_intent_data: {
      application_fee_amount: parsed.applicationFeeCents,
      transfer_data: { destination: parsed.destinationAccountId },
      metadata: parsed.metadata,
    },
  };
}

/** Subscription checkout for a PMC's account: per-property price plus an optional activation fee. */
export function buildBillingCheckoutParams(
  input: CreateBillingCheckoutInput,
): Stripe.Checkout.SessionCreateParams {
  const parsed = createBillingCheckoutSchema.parse(input);
  const lineItems: Stripe.Checkout.SessionCreateParams.LineItem[] = [
    { price: parsed.priceId, quantity: parsed.quantity },
  ];
  if (parsed.setupPriceId) lineItems.push({ price: parsed.setupPriceId, quantity: 1 });

  return {
    mode: 'subscription',
    line_items: lineItems,
    success_url: parsed.successUrl,
    cancel_url: parsed.cancelUrl,
    metadata: parsed.metadata,
    ...(parsed.customerId ? { customer: parsed.customerId } : { customer_email: parsed.customerEmail }),
    ...(parsed.clientReferenceId ? { client_reference_id: parsed.clientReferenceId } : {}),
    subscription_data: { metadata: parsed.metadata },
  };
}

/**
 * Stripe payments adapter: Checkout Sessions with destination charges,
 * and Connect OAuth for the PMC's payout account.
 */
export class StripePaymentsAdapter implements IPaymentsAdapter {
  readonly providerName = 'Stripe';

  constructor(
    private readonly stripe: Stripe,
    private readonly connectClientId: string,
  ) {}

  async createCheckoutSession(input: CreateCheckoutSessionInput): Promise<CheckoutSessionResult> {
    const session = await this.stripe.checkout.sessions.create(
      buildCheckoutSessionParams(input),
      { idempotencyKey: input.idempotencyKey },
    );
    if (!session.url) {
      throw new Error(`Stripe checkout session ${session.id} has no url`);
    }
    return { id: session.id, url: session.url };
  }

  async createBillingCheckoutSession(input: CreateBillingCheckoutInput): Promise<CheckoutSessionResult> {
    const session = await this.stripe.checkout.sessions.create(
      buildBillingCheckoutParams(input),
      { idempotencyKey: input.idempotencyKey },
    );
    if (!session.url) {
      throw new Error(`Stripe checkout session ${session.id} has no url`);
    }
    return { id: session.id, url: session.url };
  }

  buildConnectAuthorizeUrl(state: string, redirectUri: string): string {
    return this.stripe.oauth.authorizeUrl({
      response_type: 'code',
      client_id: this.connectClientId,
      scope: 'read_write',
      state,
      redirect_uri: redirectUri,
    });
  }

  async exchangeConnectCode(code: string): Promise<{ accountId: string }> {
    const token = await this.stripe.oauth.token({ grant_type: 'authorization_code', code });
    if (!token.stripe_user_id) {
      throw new Error('Stripe OAuth response did not include an account id');
    }
    return { accountId: token.stripe_user_id };
  }

  async deauthorizeConnectAccount(accountId: string): Promise<void> {
    await this.stripe.oauth.deauthorize({
      client_id: this.connectClientId,
      stripe_user_id: accountId,
    });
  }
}
