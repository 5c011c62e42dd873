/**
 * Conversational replies: canned deflection and greeting, otherwise a short
 * persona reply from the chat model.
 */

import { errorMessage, fail, ok, type Result } from '../errors.js';
import type { CompletionGateway } from '../llm/gateway.js';
import { buildChatMessages } from '../llm/prompt.js';

export const OFF_TOPIC_KEYWORDS: readonly string[] = ['movie', 'song', 'weather', 'capital', 'sport', 'game', 'recipe'];
export const GREETINGS: readonly string[] = ['hi', 'hello', 'hey', 'hallo', 'hai'];

export const OFF_TOPIC_MESSAGE =
  'I can only answer questions related to our business topics like sales, inventory, finance, and employees. How can I help you with those?';
export const GREETING_MESSAGE = 'Hi there! How can I help you today?';

export interface ConversationOptions {
  model: string;
}

/** Returns the canned reply for `utterance`, if one applies. */
export function cannedReply(utterance: string): string | undefined {
  const lowered = utterance.toLowerCase();
  if (OFF_TOPIC_KEYWORDS.some((k) => lowered.includes(k))) {
    return OFF_TOPIC_MESSAGE;
  }
  if (GREETINGS.includes(lowered.trim())) {
    return GREETING_MESSAGE;
  }
  return undefined;
}

export async function conversationalReply(
  utterance: string,
  gateway: CompletionGateway,
  options: ConversationOptions,
): Promise<Result<string>> {
  const canned = cannedReply(utterance);
  if (canned) return ok(canned);

  try {
    const text = await gateway.complete(buildChatMessages(utterance), {
      model: options.model,
      temperature: 0.7,
      maxTokens: 150,
    });
    return ok(text);
  } catch (err: unknown) {
    return fail('reply_failed', errorMessage(err));
  }
}
