/**
 * Completion types shared by the transports and the gateway.
 */

export type PromptRole = 'system' | 'user';

export interface PromptMessage {
  readonly role: PromptRole;
  readonly content: string;
}

export interface CompletionRequest {
  messages: readonly PromptMessage[];
  model: string;
  temperature: number;
  maxTokens: number;
}

export type TransportKind = 'sdk' | 'rest';

/**
 * One way of reaching the chat-completions backend.
 * Implementations return the raw content (possibly empty) or throw.
 */
export interface CompletionTransport {
  readonly kind: TransportKind;
  complete(request: CompletionRequest): Promise<string>;
}

export interface TransportOptions {
  apiKey: string;
  /** OpenAI-compatible base URL, no trailing slash */
  baseUrl: string;
  timeoutMs: number;
}
