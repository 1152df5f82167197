// Re-export all integration interfaces from a single entry point.
export type {
  IPmsAdapter,
  PmsAccessToken,
  PmsCredentials,
  PmsListing,
  PmsReservation,
} from './pms';
export type {
  CheckoutLineItem,
  CheckoutSessionResult,
  CreateBillingCheckoutInput,
  CreateCheckoutSessionInput,
  IPaymentsAdapter,
} from './payments';
export type { CompletionRequest, ILlmAdapter, LlmMessage, LlmPurpose, LlmRole } from './llm';
