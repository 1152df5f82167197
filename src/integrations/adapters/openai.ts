import OpenAI from 'openai';
import type { CompletionRequest, ILlmAdapter, LlmMessage, LlmPurpose } from '../interfaces/llm';

function toOpenAiMessage(message: LlmMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * OpenAI chat-completions adapter. Each purpose maps to its own model.
 */
export class OpenAiLlmAdapter implements ILlmAdapter {
  readonly providerName = 'OpenAI';

  constructor(
    private readonly client: OpenAI,
    private readonly models: Record<LlmPurpose, string>,
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.models[request.purpose],
      messages: request.messages.map(toOpenAiMessage),
      temperature: request.temperature ?? 0.4,
      ...(request.maxTokens ? { max_tokens: request.maxTokens } : {}),
      ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const content = completion.choices[0]?.message.content?.trim();
    if (!content) {
      throw new Error(`OpenAI returned an empty completion for ${request.purpose}`);
    }
    return content;
  }
}
