/**
 * Interface for the payment processor: hosted checkout plus Connect
 * onboarding for the PMC's payout account.
 */

export interface CheckoutLineItem {
  /** Pre-created processor price; when absent the amount below is sent inline. */
  priceId: string | null;
  name: string;
  description: string | null;
  amountCents: number;
  currency: string;
}

export interface CreateCheckoutSessionInput {
  lineItem: CheckoutLineItem;
  metadata: Record<string, string>;
  applicationFeeCents: number;
  destinationAccountId: string;
  successUrl: string;
  cancelUrl: string;
  /** Same key, same session: repeated calls must not create a second charge. */
  idempotencyKey: string;
  clientReferenceId?: string;
}

/** Subscription checkout that pays for the PMC's own account. */
export interface CreateBillingCheckoutInput {
  /** Recurring per-property price. */
  priceId: string;
  quantity: number;
  /** One-time activation fee charged with the first invoice, when configured. */
  setupPriceId: string | null;
  /** Existing processor customer; otherwise the email prefills a new one. */
  customerId: string | null;
  customerEmail: string;
  metadata: Record<string, string>;
  successUrl: string;
  cancelUrl: string;
  idempotencyKey: string;
  clientReferenceId?: string;
}

export interface CheckoutSessionResult {
  id: string;
  url: string;
}

export interface IPaymentsAdapter {
  readonly providerName: string;

  createCheckoutSession(input: CreateCheckoutSessionInput): Promise<CheckoutSessionResult>;

  createBillingCheckoutSession(input: CreateBillingCheckoutInput): Promise<CheckoutSessionResult>;

  /** URL the PMC admin is sent to for connecting a payout account. */
  buildConnectAuthorizeUrl(state: string, redirectUri: string): string;

  exchangeConnectCode(code: string): Promise<{ accountId: string }>;

  deauthorizeConnectAccount(accountId: string): Promise<void>;
}
