import { extractNounPhrases, type PhraseExtractor } from './phraseExtractor';

// "$10", "$10.50" or "10$"; a trailing sentence period is not part of the price
const PRICE_PATTERN = /\$\d+(?:\.\d+)?|\d+(?:\.\d+)?\$/g;

export const BULLISH_WORDS: ReadonlySet<string> = new Set(['buy', 'bull', 'long', 'up', 'calls', 'moon', 'higher']);
export const BEARISH_WORDS: ReadonlySet<string> = new Set(['sell', 'bear', 'short', 'down', 'puts', 'crash', 'lower']);
export const MARKET_TERMS: readonly string[] = ['market', 'stock', 'trade', 'price', 'investor'];

export const DEFAULT_MAX_TOPICS = 5;

/** Counts literal price tokens across the batch. "$10" and "$10.00" are distinct keys. */
export function extractPriceMentions(texts: readonly string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const text of texts) {
    for (const match of text.match(PRICE_PATTERN) ?? []) {
      counts[match] = (counts[match] ?? 0) + 1;
    }
  }
  return counts;
}

const wordsOf = (text: string): string[] => text.toLowerCase().split(/[^a-z]+/).filter(Boolean);

/**
 * Share of bullish texts among texts carrying any directional word.
 * A text may count toward both sides. 0.5 when no text carries either.
 */
export function calculateBullishRatio(texts: readonly string[]): number {
  let bullish = 0;
  let bearish = 0;

  for (const text of texts) {
    const words = wordsOf(text);
    if (words.some((w) => BULLISH_WORDS.has(w))) bullish++;
    if (words.some((w) => BEARISH_WORDS.has(w))) bearish++;
  }

  const total = bullish + bearish;
  return total > 0 ? bullish / total : 0.5;
}

/**
 * Market-related noun phrases across the batch, longest first.
 * Equal lengths are ordered alphabetically.
 */
export function extractTopics(
  texts: readonly string[],
  maxTopics: number = DEFAULT_MAX_TOPICS,
  extractPhrases: PhraseExtractor = extractNounPhrases
): string[] {
  if (texts.length === 0 || maxTopics <= 0) return [];

  // phrases never span two posts
  const candidates = texts.flatMap((text) => extractPhrases(text));
  const relevant = new Set(
    candidates.filter((phrase) => MARKET_TERMS.some((term) => phrase.includes(term)))
  );

  return [...relevant]
    .sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, maxTopics);
}
