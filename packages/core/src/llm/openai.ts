/**
 * SDK transport: the `openai` client pointed at the configured
 * OpenAI-compatible base URL.
 */

import OpenAI from 'openai';
import { CompletionFailedError } from '../errors.js';
import type { CompletionRequest, CompletionTransport, PromptMessage, TransportOptions } from './types.js';

export interface SdkChatBody {
  model: string;
  messages: OpenAI.ChatCompletionMessageParam[];
  temperature: number;
  max_tokens: number;
}

export interface SdkChatResponse {
  choices: Array<{ message: { content: string | null } }>;
}

/** The one SDK call this transport makes; injectable for tests. */
export type ChatCreate = (body: SdkChatBody) => Promise<SdkChatResponse>;

function toSdkMessage(message: PromptMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAISdkTransport implements CompletionTransport {
  readonly kind = 'sdk' as const;
  private readonly create: ChatCreate;

  constructor(options: TransportOptions, create?: ChatCreate) {
    if (create) {
      this.create = create;
      return;
    }
    const client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.create = (body) => client.chat.completions.create(body);
  }

  async complete(request: CompletionRequest): Promise<string> {
    let response: SdkChatResponse;
    try {
      response = await this.create({
        model: request.model,
        messages: request.messages.map(toSdkMessage),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIError) {
        throw new CompletionFailedError(this.kind, err.message, err.status);
      }
      throw err;
    }

    const content = response.choices[0]?.message.content;
    if (content === null || content === undefined) {
      throw new CompletionFailedError(this.kind, 'Response carried no message content');
    }
    return content;
  }
}
