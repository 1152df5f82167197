/**
 * Interface for the LLM completion provider.
 */

export type LlmRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

/** Which configured model a request should use. */
export type LlmPurpose = 'chat' | 'summary' | 'sentiment';

export interface CompletionRequest {
  purpose: LlmPurpose;
  messages: LlmMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a single JSON object. */
  json?: boolean;
}

export interface ILlmAdapter {
  readonly providerName: string;

  /** Returns the assistant's text. Throws when the provider fails or returns nothing. */
  complete(request: CompletionRequest): Promise<string>;
}
