export type PolarityLabel = 'positive' | 'neutral' | 'negative';
export type MarketLabel = 'bullish' | 'neutral' | 'bearish';
export type SentimentLabel = PolarityLabel | MarketLabel;

export type LabelVocabulary = 'polarity' | 'market';

export interface SentimentThresholds {
  /** Mean strictly above this is positive / bullish. */
  positiveThreshold: number;
  /** Mean strictly below this is negative / bearish. */
  negativeThreshold: number;
  vocabulary: LabelVocabulary;
}

export interface SentimentResult {
  score: number;
  label: SentimentLabel;
  itemCount: number;
}

export const DEFAULT_THRESHOLDS: SentimentThresholds = {
  positiveThreshold: 0,
  negativeThreshold: 0,
  vocabulary: 'polarity',
};

/** ±0.1 band used for the bullish / bearish reading of social posts. */
export const MARKET_THRESHOLDS: SentimentThresholds = {
  positiveThreshold: 0.1,
  negativeThreshold: -0.1,
  vocabulary: 'market',
};

const LABELS: Record<LabelVocabulary, { up: SentimentLabel; down: SentimentLabel }> = {
  polarity: { up: 'positive', down: 'negative' },
  market: { up: 'bullish', down: 'bearish' },
};

export class SentimentAggregator {
  private readonly thresholds: SentimentThresholds;

  constructor(thresholds: Partial<SentimentThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds };
    if (this.thresholds.negativeThreshold > this.thresholds.positiveThreshold) {
      throw new RangeError('negativeThreshold must not exceed positiveThreshold');
    }
  }

  aggregate(scores: readonly number[]): SentimentResult {
    if (scores.length === 0) {
      return { score: 0, label: 'neutral', itemCount: 0 };
    }

    const score = scores.reduce((sum, s) => sum + s, 0) / scores.length;
    return { score, label: this.labelFor(score), itemCount: scores.length };
  }

  labelFor(score: number): SentimentLabel {
    const { positiveThreshold, negativeThreshold, vocabulary } = this.thresholds;
    if (score > positiveThreshold) return LABELS[vocabulary].up;
    if (score < negativeThreshold) return LABELS[vocabulary].down;
    return 'neutral';
  }
}
