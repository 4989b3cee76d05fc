import type { AppConfig } from '@/config';
import { TtlCache } from '@/services/cache/ttlCache';
import { withStaleFallback } from '@/services/cache/staleFallback';
import { StockPriceClient, type StockInfo } from '@/services/stocks/stockPriceClient';
import { TwitterSearchClient } from '@/services/twitter/twitterSearchClient';
import { InvalidInputError } from '@/utils/errors';
import { createLogger } from '@/utils/logger';
import {
  buildSymbolQuery,
  normalizeSymbol,
  normalizeSymbols,
  parsePositiveInt,
  parseSubject,
} from '@/utils/validation';
import {
  DEFAULT_THRESHOLDS,
  MARKET_THRESHOLDS,
  SentimentAggregator,
  type SentimentLabel,
} from './aggregator';
import {
  MarketAssessmentEngine,
  analyzeBatch,
  type BatchAnalysisOptions,
  type MarketAssessment,
  type PriceSignal,
} from './marketAssessment';
import type { PhraseExtractor } from './phraseExtractor';
import { AfinnPolarityScorer, type PolarityScorer } from './polarityScorer';
import { extractPriceMentions, extractTopics } from './textSignals';

const log = createLogger('sentiment');

const MAX_TEXT_LENGTH = 5000;
const CORRELATED_TOPIC_COUNT = 5;
const DEFAULT_TREND_POSTS = 50;
const DEFAULT_MONITOR_POSTS = 50;

export interface SentimentSnapshot {
  subject: string;
  score: number;
  label: SentimentLabel;
  itemCount: number;
  topics: string[];
  priceMentions: Record<string, number>;
  bullishRatio: number;
}

export interface SymbolInsight {
  sentimentScore: number;
  postCount: number;
  priceMentions: Record<string, number>;
  bullishRatio: number;
  topics: string[];
}

export interface MarketTrends {
  marketInsights: Record<string, SymbolInsight>;
  sectorSentiment: SentimentLabel;
  correlatedTopics: string[];
  marketMood: SentimentLabel;
}

export interface PriceSentimentCorrelation {
  avgMentionedPrice: number;
  sentimentScore: number;
}

export interface MarketMonitor {
  symbols: string[];
  sentimentBySymbol: Record<string, number>;
  overallMarketSentiment: SentimentLabel;
  trendingTopics: string[];
  priceSentimentCorrelation: Record<string, PriceSentimentCorrelation>;
}

export interface TextSentiment {
  text: string;
  sentiment: SentimentLabel;
  polarity: number;
  subjectivity: number;
}

export interface PostSearch {
  searchTexts(query: string, limit?: number): Promise<string[]>;
}

export interface PriceSource {
  getPriceSignal(symbol: string): Promise<PriceSignal | null>;
  getStockInfo(symbol: string): Promise<StockInfo>;
}

export interface MarketSentimentServiceOptions {
  search: PostSearch;
  prices: PriceSource;
  scorer?: PolarityScorer;
  cacheTtlMs?: number;
  strongThreshold?: number;
  maxTopics?: number;
  searchLimit?: number;
  extractPhrases?: PhraseExtractor;
}

/** Most frequent first; ties keep first-seen order. */
const mostCommon = (values: readonly string[], count: number): string[] => {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, count)
    .map(([value]) => value);
};

const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Entry point for the transport layer: symbol assessments, social snapshots
 * for symbols or keyword lists, multi-symbol trends and watchlist monitoring.
 */
export class MarketSentimentService {
  private readonly search: PostSearch;
  private readonly prices: PriceSource;
  private readonly scorer: PolarityScorer;
  private readonly engine: MarketAssessmentEngine;
  private readonly snapshots: TtlCache<SentimentSnapshot>;
  private readonly assessments: TtlCache<MarketAssessment>;
  private readonly marketBatch: BatchAnalysisOptions;
  private readonly polarityAggregator = new SentimentAggregator(DEFAULT_THRESHOLDS);
  private readonly marketAggregator = new SentimentAggregator(MARKET_THRESHOLDS);
  private readonly searchLimit: number;
  private readonly maxTopics: number | undefined;
  private readonly extractPhrases: PhraseExtractor | undefined;

  constructor(options: MarketSentimentServiceOptions) {
    const ttlMs = options.cacheTtlMs ?? 60 * 60 * 1000; // 1 hour

    this.search = options.search;
    this.prices = options.prices;
    this.scorer = options.scorer ?? new AfinnPolarityScorer();
    this.searchLimit = options.searchLimit ?? 100;
    this.maxTopics = options.maxTopics;
    this.extractPhrases = options.extractPhrases;
    this.assessments = new TtlCache<MarketAssessment>(ttlMs);
    this.snapshots = new TtlCache<SentimentSnapshot>(ttlMs);
    this.engine = new MarketAssessmentEngine({
      cache: this.assessments,
      scorer: this.scorer,
      aggregator: this.polarityAggregator,
      strongThreshold: options.strongThreshold,
      maxTopics: options.maxTopics,
      extractPhrases: options.extractPhrases,
    });
    this.marketBatch = {
      scorer: this.scorer,
      aggregator: this.marketAggregator,
      maxTopics: options.maxTopics,
      extractPhrases: options.extractPhrases,
    };
  }

  async evaluateSentiment(symbolInput: unknown): Promise<MarketAssessment> {
    const symbol = normalizeSymbol(symbolInput);
    return this.engine.evaluate(
      symbol,
      () => this.search.searchTexts(buildSymbolQuery(symbol), this.searchLimit),
      () => this.prices.getPriceSignal(symbol)
    );
  }

  /** Bullish / bearish reading of recent posts for a symbol or keyword list. */
  async analyzeSubjectSentiment(subjectInput: unknown, limit: number = this.searchLimit): Promise<SentimentSnapshot> {
    const subject = parseSubject(subjectInput);
    const label = subject.kind === 'symbol' ? subject.symbol : subject.keywords.join(', ');
    const cacheKey = `${subject.key}:${limit}`;

    const cached = this.snapshots.get(cacheKey);
    if (cached) return cached;

    return withStaleFallback(this.snapshots, cacheKey, async () => {
      const texts = await this.search.searchTexts(subject.query, limit);
      const batch = analyzeBatch(texts, this.marketBatch);
      const snapshot: SentimentSnapshot = {
        subject: label,
        score: batch.sentiment.score,
        label: batch.sentiment.label,
        itemCount: batch.sentiment.itemCount,
        topics: batch.topics,
        priceMentions: batch.priceMentions,
        bullishRatio: batch.bullishRatio,
      };

      this.snapshots.set(cacheKey, snapshot);
      log.info('Sentiment snapshot computed', { subject: label, score: snapshot.score, items: snapshot.itemCount });
      return snapshot;
    });
  }

  async analyzeMarketTrends(symbolsInput: unknown, minPostsInput?: unknown): Promise<MarketTrends> {
    const symbols = normalizeSymbols(symbolsInput);
    const limit = parsePositiveInt(minPostsInput, 'min_tweets', DEFAULT_TREND_POSTS, 100);

    const snapshots = await Promise.all(symbols.map((symbol) => this.analyzeSubjectSentiment(symbol, limit)));

    const marketInsights: Record<string, SymbolInsight> = {};
    snapshots.forEach((snapshot, i) => {
      marketInsights[symbols[i]] = {
        sentimentScore: snapshot.score,
        postCount: snapshot.itemCount,
        priceMentions: snapshot.priceMentions,
        bullishRatio: snapshot.bullishRatio,
        topics: snapshot.topics,
      };
    });

    const marketMood = this.marketAggregator.labelFor(mean(snapshots.map((s) => s.score)));
    return {
      marketInsights,
      sectorSentiment: marketMood,
      correlatedTopics: mostCommon(snapshots.flatMap((s) => s.topics), CORRELATED_TOPIC_COUNT),
      marketMood,
    };
  }

  async monitorMarket(watchlistInput: unknown): Promise<MarketMonitor> {
    const symbols = normalizeSymbols(watchlistInput);

    const batches = await Promise.all(
      symbols.map((symbol) => this.search.searchTexts(buildSymbolQuery(symbol), DEFAULT_MONITOR_POSTS))
    );

    const sentimentBySymbol: Record<string, number> = {};
    symbols.forEach((symbol, i) => {
      const scores = batches[i].map((text) => this.scorer.score(text).polarity);
      sentimentBySymbol[symbol] = this.marketAggregator.aggregate(scores).score;
    });

    const allTexts = batches.flat();
    const priceSentimentCorrelation: Record<string, PriceSentimentCorrelation> = {};
    for (const symbol of symbols) {
      const prices = Object.keys(extractPriceMentions(allTexts.filter((t) => t.includes(symbol))));
      if (prices.length === 0) continue;

      priceSentimentCorrelation[symbol] = {
        avgMentionedPrice: mean(prices.map((p) => parseFloat(p.replace(/\$/g, '')))),
        sentimentScore: sentimentBySymbol[symbol],
      };
    }

    return {
      symbols,
      sentimentBySymbol,
      overallMarketSentiment: this.marketAggregator.labelFor(mean(Object.values(sentimentBySymbol))),
      trendingTopics: extractTopics(allTexts, this.maxTopics, this.extractPhrases),
      priceSentimentCorrelation,
    };
  }

  analyzeText(text: unknown): TextSentiment {
    if (typeof text !== 'string' || text.trim() === '') {
      throw new InvalidInputError('Text is required');
    }
    if (text.length > MAX_TEXT_LENGTH) {
      throw new InvalidInputError(`Text must be at most ${MAX_TEXT_LENGTH} characters`);
    }

    const { polarity, subjectivity } = this.scorer.score(text);
    return {
      text,
      sentiment: this.polarityAggregator.labelFor(polarity),
      polarity,
      subjectivity,
    };
  }

  async getStockInfo(symbolInput: unknown): Promise<StockInfo> {
    return this.prices.getStockInfo(normalizeSymbol(symbolInput));
  }
}

export function createMarketSentimentService(config: AppConfig): MarketSentimentService {
  const search = new TwitterSearchClient({
    bearerToken: config.twitter.bearerToken,
    baseUrl: config.twitter.baseUrl,
    timeoutMs: config.upstreamTimeoutMs,
  });
  if (!search.isConfigured()) {
    log.warn('TWITTER_BEARER_TOKEN is not set; post search will fail until it is configured');
  }

  return new MarketSentimentService({
    search,
    prices: new StockPriceClient({ baseUrl: config.stocks.baseUrl, timeoutMs: config.upstreamTimeoutMs }),
    cacheTtlMs: config.cacheTtlMs,
    strongThreshold: config.strongThreshold,
    maxTopics: config.maxTopics,
    searchLimit: config.twitter.searchLimit,
  });
}
