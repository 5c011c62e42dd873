/**
 * REST transport: a plain HTTPS POST to `{baseUrl}/chat/completions`.
 * Used when the SDK client cannot be constructed, or when configured.
 */

import { CompletionFailedError, errorMessage } from '../errors.js';
import { ajv, formatAjvErrors } from '../validation.js';
import type { CompletionRequest, CompletionTransport, TransportOptions } from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

interface ChatResponseBody {
  choices: Array<{ message: { content: string } }>;
}

const chatResponseSchema = {
  type: 'object',
  properties: {
    choices: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          message: {
            type: 'object',
            properties: { content: { type: 'string' } },
            required: ['content'],
          },
        },
        required: ['message'],
      },
    },
  },
  required: ['choices'],
} as const;

const validateChatResponse = ajv.compile<ChatResponseBody>(chatResponseSchema);

export class RestTransport implements CompletionTransport {
  readonly kind = 'rest' as const;
  private readonly options: TransportOptions;
  private readonly fetchImpl: FetchLike;

  constructor(options: TransportOptions, fetchImpl: FetchLike = fetch) {
    this.options = options;
    this.fetchImpl = fetchImpl;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const url = `${this.options.baseUrl}/chat/completions`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err: unknown) {
      throw new CompletionFailedError(this.kind, errorMessage(err));
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 200);
      throw new CompletionFailedError(
        this.kind,
        `HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new CompletionFailedError(this.kind, `Invalid JSON response: ${errorMessage(err)}`);
    }

    if (!validateChatResponse(body)) {
      throw new CompletionFailedError(
        this.kind,
        `Unexpected response shape: ${formatAjvErrors(validateChatResponse.errors).join('; ')}`,
      );
    }
    return body.choices[0].message.content;
  }
}
