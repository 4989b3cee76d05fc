import { TtlCache } from '@/services/cache/ttlCache';
import { withStaleFallback } from '@/services/cache/staleFallback';
import { NotFoundError, UpstreamUnavailableError } from '@/utils/errors';
import { createLogger } from '@/utils/logger';
import { SentimentAggregator, type SentimentResult } from './aggregator';
import type { PhraseExtractor } from './phraseExtractor';
import type { PolarityScorer } from './polarityScorer';
import {
  DEFAULT_MAX_TOPICS,
  calculateBullishRatio,
  extractPriceMentions,
  extractTopics,
} from './textSignals';

const log = createLogger('sentiment.marketAssessment');

export type PriceTrend = 'upward' | 'downward';

export interface PriceSignal {
  trend: PriceTrend;
  volatility: number; // percent, >= 0
}

export interface ScoredItem {
  text: string;
  polarity: number;
}

export interface BatchAnalysis {
  items: ScoredItem[];
  sentiment: SentimentResult;
  priceMentions: Record<string, number>;
  bullishRatio: number;
  topics: string[];
}

export interface MarketAssessment {
  readonly subject: string;
  readonly sentiment: Readonly<SentimentResult>;
  readonly trend: PriceTrend;
  readonly volatility: number;
  readonly priceMentions: Readonly<Record<string, number>>;
  readonly bullishRatio: number;
  readonly topics: readonly string[];
  readonly items: readonly Readonly<ScoredItem>[];
  readonly assessment: string;
  readonly producedAt: string;
}

export type TextFetcher = () => Promise<string[]>;
/** Resolves null when the subject has no price history. */
export type PriceFetcher = () => Promise<PriceSignal | null>;

export interface BatchAnalysisOptions {
  scorer: PolarityScorer;
  aggregator: SentimentAggregator;
  maxTopics?: number;
  extractPhrases?: PhraseExtractor;
}

export interface MarketAssessmentEngineOptions {
  cache: TtlCache<MarketAssessment>;
  scorer: PolarityScorer;
  aggregator?: SentimentAggregator;
  /** Mean polarity beyond ±this reads as "strong". */
  strongThreshold?: number;
  maxTopics?: number;
  extractPhrases?: PhraseExtractor;
}

export const DEFAULT_STRONG_THRESHOLD = 0.2;

/**
 * Scores every item and runs the text extractors over one batch.
 * An empty batch yields the neutral reading: score 0, ratio 0.5, no topics.
 */
export function analyzeBatch(texts: readonly string[], options: BatchAnalysisOptions): BatchAnalysis {
  const items = texts.map((text) => ({ text, polarity: options.scorer.score(text).polarity }));
  return {
    items,
    sentiment: options.aggregator.aggregate(items.map((item) => item.polarity)),
    priceMentions: extractPriceMentions(texts),
    bullishRatio: calculateBullishRatio(texts),
    topics: extractTopics(texts, options.maxTopics ?? DEFAULT_MAX_TOPICS, options.extractPhrases),
  };
}

export function classifyAssessment(
  avgSentiment: number,
  trend: PriceTrend,
  strongThreshold: number = DEFAULT_STRONG_THRESHOLD
): string {
  if (avgSentiment > strongThreshold && trend === 'upward') {
    return 'Strong bullish sentiment with positive momentum';
  }
  if (avgSentiment > 0 && trend === 'upward') {
    return 'Moderately bullish sentiment';
  }
  if (avgSentiment < -strongThreshold && trend === 'downward') {
    return 'Strong bearish sentiment with negative momentum';
  }
  if (avgSentiment < 0 && trend === 'downward') {
    return 'Moderately bearish sentiment';
  }
  return 'Mixed or neutral market sentiment';
}

const freezeAssessment = (assessment: MarketAssessment): MarketAssessment => {
  Object.freeze(assessment.sentiment);
  Object.freeze(assessment.priceMentions);
  Object.freeze(assessment.topics);
  assessment.items.forEach((item) => Object.freeze(item));
  Object.freeze(assessment.items);
  return Object.freeze(assessment);
};

/**
 * Combines post sentiment with the price trend into a cached assessment.
 *
 * Concurrent misses for one subject share a single upstream fetch. When the
 * upstream is rate limited the last cached answer is served even if expired.
 */
export class MarketAssessmentEngine {
  private readonly cache: TtlCache<MarketAssessment>;
  private readonly batchOptions: BatchAnalysisOptions;
  private readonly strongThreshold: number;
  private inflight: Map<string, Promise<MarketAssessment>> = new Map();

  constructor(options: MarketAssessmentEngineOptions) {
    this.cache = options.cache;
    this.strongThreshold = options.strongThreshold ?? DEFAULT_STRONG_THRESHOLD;
    this.batchOptions = {
      scorer: options.scorer,
      aggregator: options.aggregator ?? new SentimentAggregator(),
      maxTopics: options.maxTopics ?? DEFAULT_MAX_TOPICS,
      extractPhrases: options.extractPhrases,
    };
  }

  async evaluate(subject: string, fetchTexts: TextFetcher, fetchPrice: PriceFetcher): Promise<MarketAssessment> {
    const cached = this.cache.get(subject);
    if (cached) {
      log.debug('Returning cached assessment', { subject, ageMs: this.cache.ageMs(subject) });
      return cached;
    }

    const pending = this.inflight.get(subject);
    if (pending) return pending;

    const run = withStaleFallback(this.cache, subject, () => this.compute(subject, fetchTexts, fetchPrice))
      .finally(() => this.inflight.delete(subject));
    this.inflight.set(subject, run);
    return run;
  }

  private async compute(subject: string, fetchTexts: TextFetcher, fetchPrice: PriceFetcher): Promise<MarketAssessment> {
    const startTime = Date.now();

    const price = await fetchPrice();
    if (!price) {
      throw new NotFoundError(subject, 'no price history');
    }
    if (!Number.isFinite(price.volatility) || price.volatility < 0) {
      throw new UpstreamUnavailableError('price source', `invalid volatility ${price.volatility} for ${subject}`);
    }

    const texts = await fetchTexts();
    if (texts.length === 0) {
      log.info('No posts found, recording neutral assessment', { subject });
    }

    const batch = analyzeBatch(texts, this.batchOptions);
    const assessment = freezeAssessment({
      subject,
      sentiment: batch.sentiment,
      trend: price.trend,
      volatility: price.volatility,
      priceMentions: batch.priceMentions,
      bullishRatio: batch.bullishRatio,
      topics: batch.topics,
      items: batch.items,
      assessment: classifyAssessment(batch.sentiment.score, price.trend, this.strongThreshold),
      producedAt: new Date().toISOString(),
    });

    this.cache.set(subject, assessment);
    log.info('Market assessment computed', {
      subject,
      score: assessment.sentiment.score,
      label: assessment.sentiment.label,
      items: assessment.sentiment.itemCount,
      trend: assessment.trend,
      durationMs: Date.now() - startTime,
    });
    return assessment;
  }
}
