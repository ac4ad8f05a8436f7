import { encode } from 'gpt-tokenizer';
import { createLogger, NAMESPACES } from '../logging.js';

const log = createLogger(NAMESPACES.agents.base);

/**
 * Count tokens with the GPT tokenizer.
 * Falls back to character-based estimation if tokenization fails
 */
export function countTokens(text: string): number {
  if (!text) return 0;

  try {
    return encode(text).length;
  } catch (error) {
    log('Tokenization failed, using fallback estimation: %o', error);
    // ~4 characters per token
    return Math.max(1, Math.round(text.length / 4));
  }
}

/**
 * Rough word budget for a token limit, used in prompt wording.
 * @param wordsPerToken - 0.75 suits English prose
 */
export function estimateWordsFromTokens(
  tokens: number,
  wordsPerToken: number = 0.75
): number {
  return Math.round(tokens * wordsPerToken);
}
