import type { CompletionRequest, ILlmAdapter } from '../interfaces/llm';

export type StubResponder = (request: CompletionRequest) => string;

export const defaultStubResponder: StubResponder = (request) => {
  switch (request.purpose) {
    case 'sentiment':
      return '{"sentiment":"neutral","mood":"calm","confidence":60,"flags":{}}';
    case 'summary':
      return [
        '**What the guest wants:** General help with their stay.',
        '**Key facts:** None yet.',
        '**Risks:** None.',
        '**Next action:** No action needed.',
      ].join('\n');
    case 'chat':
      return 'Happy to help! Let me know if there is anything else you need during your stay.';
  }
};

/**
 * Stub LLM adapter. Answers from a responder function and records every
 * request so tests can inspect the prompts.
 */
export class StubLlmAdapter implements ILlmAdapter {
  readonly providerName = 'StubLLM';
  readonly requests: CompletionRequest[] = [];
  failure: Error | null = null;

  constructor(private responder: StubResponder = defaultStubResponder) {}

  respondWith(responder: StubResponder): void {
    this.responder = responder;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.failure) throw this.failure;
    return this.responder(request);
  }
}
