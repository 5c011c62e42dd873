/**
 * Intent classification: conversational vs data-seeking.
 */

export const CONVERSATIONAL_TRIGGERS: readonly string[] = [
  'hello',
  'hi',
  'hey',
  'hallo',
  'hai',
  'how are you',
  'thank you',
  'thanks',
  'bye',
  'goodbye',
  'what can you do',
  'help',
  'who are you',
  'what is your name',
  'tell me a joke',
];

/** Lowercase, keep letters, digits, underscores and whitespace, trim. */
export function cleanUtterance(utterance: string): string {
  return utterance
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .trim();
}

/**
 * True when the utterance is, or starts with, a trigger phrase.
 * Matching stops at a word boundary: "highest sales" is not "hi".
 * Anything that merely opens with a greeting ("hi, what were sales") is
 * still conversational.
 */
export function isConversational(utterance: string): boolean {
  const cleaned = cleanUtterance(utterance);
  return CONVERSATIONAL_TRIGGERS.some(
    (phrase) => cleaned === phrase || (cleaned.startsWith(phrase) && /^\s/.test(cleaned.slice(phrase.length))),
  );
}
