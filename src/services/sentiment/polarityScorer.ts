import Sentiment from 'sentiment';

export interface PolarityScore {
  polarity: number; // -1 to 1
  subjectivity: number; // 0 to 1
}

export interface PolarityScorer {
  score(text: string): PolarityScore;
}

// AFINN weights run from -5 to 5
const MAX_WORD_WEIGHT = 5;

// Market slang AFINN does not cover
const MARKET_LEXICON: Record<string, number> = {
  bullish: 3,
  bearish: -3,
  moon: 3,
  rally: 2,
  surge: 2,
  breakout: 2,
  crash: -3,
  crashing: -3,
  dump: -3,
  plunge: -3,
  selloff: -2,
};

/**
 * Scores text with the AFINN word list from the `sentiment` package.
 *
 * Polarity is the mean weight of the scored words scaled to [-1, 1];
 * subjectivity is the share of tokens that carry a weight.
 */
export class AfinnPolarityScorer implements PolarityScorer {
  private sentiment = new Sentiment();

  constructor(private readonly extras: Record<string, number> = MARKET_LEXICON) {}

  score(text: string): PolarityScore {
    const result = this.sentiment.analyze(text, { extras: this.extras });
    const scoredWords = result.calculation.length;

    if (scoredWords === 0 || result.tokens.length === 0) {
      return { polarity: 0, subjectivity: 0 };
    }

    const polarity = result.score / (MAX_WORD_WEIGHT * scoredWords);
    return {
      polarity: Math.max(-1, Math.min(1, polarity)),
      subjectivity: Math.min(1, scoredWords / result.tokens.length),
    };
  }
}
