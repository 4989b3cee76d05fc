import { InvalidInputError } from './errors';

const SYMBOL_PATTERN = /^[A-Z][A-Z0-9.-]{0,9}$/;
const MAX_KEYWORDS = 10;
const MAX_KEYWORD_LENGTH = 64;
const MAX_SYMBOLS = 20;

export type Subject =
  | { kind: 'symbol'; key: string; symbol: string; query: string }
  | { kind: 'keywords'; key: string; keywords: string[]; query: string };

export function normalizeSymbol(input: unknown): string {
  if (typeof input !== 'string') {
    throw new InvalidInputError('Symbol is required');
  }
  const symbol = input.trim().replace(/^\$/, '').toUpperCase();
  if (!SYMBOL_PATTERN.test(symbol)) {
    throw new InvalidInputError(`Invalid symbol "${input}"`);
  }
  return symbol;
}

export function normalizeSymbols(input: unknown): string[] {
  if (!Array.isArray(input) || input.length === 0) {
    throw new InvalidInputError('At least one symbol is required');
  }
  if (input.length > MAX_SYMBOLS) {
    throw new InvalidInputError(`At most ${MAX_SYMBOLS} symbols may be requested at once`);
  }
  return [...new Set(input.map(normalizeSymbol))];
}

export function normalizeKeywords(input: unknown): string[] {
  if (!Array.isArray(input) || input.length === 0) {
    throw new InvalidInputError('At least one keyword is required');
  }
  if (input.length > MAX_KEYWORDS) {
    throw new InvalidInputError(`At most ${MAX_KEYWORDS} keywords may be given`);
  }

  const keywords = input.map((keyword) => {
    if (typeof keyword !== 'string') {
      throw new InvalidInputError('Keywords must be strings');
    }
    const trimmed = keyword.trim().replace(/\s+/g, ' ');
    if (trimmed.length === 0 || trimmed.length > MAX_KEYWORD_LENGTH || trimmed.includes('"')) {
      throw new InvalidInputError(`Invalid keyword "${keyword}"`);
    }
    return trimmed.toLowerCase();
  });

  return [...new Set(keywords)].sort();
}

export function buildSymbolQuery(symbol: string): string {
  return `$${symbol} OR #${symbol} lang:en -is:retweet`;
}

/** A symbol string or a keyword list. */
export function parseSubject(input: unknown): Subject {
  if (Array.isArray(input)) {
    const keywords = normalizeKeywords(input);
    const terms = keywords.map((k) => (k.includes(' ') ? `"${k}"` : k));
    return {
      kind: 'keywords',
      key: `keywords:${keywords.join('|')}`,
      keywords,
      query: `(${terms.join(' OR ')}) lang:en -is:retweet`,
    };
  }

  const symbol = normalizeSymbol(input);
  return { kind: 'symbol', key: `symbol:${symbol}`, symbol, query: buildSymbolQuery(symbol) };
}

export function parsePositiveInt(input: unknown, name: string, fallback: number, max: number): number {
  if (input === undefined || input === null) return fallback;
  const value = typeof input === 'string' ? Number(input) : input;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > max) {
    throw new InvalidInputError(`${name} must be an integer between 1 and ${max}`);
  }
  return value;
}
