/**
 * LLM module barrel export.
 */

export type {
  CompletionRequest,
  CompletionTransport,
  PromptMessage,
  PromptRole,
  TransportKind,
  TransportOptions,
} from './types.js';
export { OpenAISdkTransport } from './openai.js';
export type { ChatCreate, SdkChatBody, SdkChatResponse } from './openai.js';
export { RestTransport } from './rest.js';
export type { FetchLike } from './rest.js';
export { createTransport } from './transport.js';
export type { TransportDeps } from './transport.js';
export { CompletionGateway } from './gateway.js';
export type { CompletionOptions } from './gateway.js';
export {
  ASSISTANT_NAME,
  CHAT_PROMPT_VERSION,
  SQL_PROMPT_VERSION,
  SUMMARY_PROMPT_VERSION,
  TEXT_VALUE_HINTS,
  buildChatMessages,
  buildSqlMessages,
  buildSummaryMessages,
} from './prompt.js';
export type { SqlPromptInput, SummaryPromptInput, TextValueHint } from './prompt.js';
