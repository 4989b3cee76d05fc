import '../../mocks/logger.mock';

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MarketSentimentService, type PostSearch, type PriceSource } from '@/services/sentiment';
import type { PolarityScorer } from '@/services/sentiment/polarityScorer';
import { InvalidInputError, RateLimitedError } from '@/utils/errors';

const POSTS: Record<string, string[]> = {
  '$AAPL OR #AAPL lang:en -is:retweet': ['AAPL at $150 looks good', 'AAPL $160 soon'],
  '$TSLA OR #TSLA lang:en -is:retweet': ['TSLA bull run', 'TSLA crash incoming'],
  '$MSFT OR #MSFT lang:en -is:retweet': ['MSFT sinking'],
  '(inflation OR "rate cut") lang:en -is:retweet': ['rate cut rally, buy everything'],
};

const POLARITY: Record<string, number> = {
  'AAPL at $150 looks good': 0.4,
  'AAPL $160 soon': 0.2,
  'TSLA bull run': 0.6,
  'TSLA crash incoming': 0.2,
  'MSFT sinking': -0.4,
  'rate cut rally, buy everything': 0.5,
  'decent quarter': 0.5,
};

const scorer: PolarityScorer = {
  score: (text) => ({ polarity: POLARITY[text] ?? 0, subjectivity: 0.5 }),
};

const createSearch = () => ({
  searchTexts: vi.fn(async (query: string) => POSTS[query] ?? []),
});

const createPrices = () => ({
  getPriceSignal: vi.fn(async () => ({ trend: 'upward' as const, volatility: 1.2 })),
  getStockInfo: vi.fn(async (symbol: string) => ({
    symbol,
    currentPrice: 110,
    priceChange: 10,
    priceChangePct: 10,
    companyName: 'Example Corp',
    industry: 'N/A',
    marketCap: 0,
    currency: 'USD',
  })),
});

describe('MarketSentimentService', () => {
  let search: ReturnType<typeof createSearch>;
  let prices: ReturnType<typeof createPrices>;
  let service: MarketSentimentService;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00Z'));

    search = createSearch();
    prices = createPrices();

    const postSearch: PostSearch = search;
    const priceSource: PriceSource = prices;
    service = new MarketSentimentService({
      search: postSearch,
      prices: priceSource,
      scorer,
      cacheTtlMs: 1000,
      extractPhrases: () => ['stock market'],
    });
  });

  describe('evaluateSentiment', () => {
    it('normalizes the symbol and queries both upstreams', async () => {
      const result = await service.evaluateSentiment(' $aapl ');

      expect(result.subject).toBe('AAPL');
      expect(search.searchTexts).toHaveBeenCalledWith('$AAPL OR #AAPL lang:en -is:retweet', 100);
      expect(prices.getPriceSignal).toHaveBeenCalledWith('AAPL');
      expect(result.sentiment.label).toBe('positive');
      expect(result.assessment).toBe('Strong bullish sentiment with positive momentum');
    });

    it('rejects malformed symbols before calling upstream', async () => {
      await expect(service.evaluateSentiment('not a symbol!')).rejects.toBeInstanceOf(InvalidInputError);
      await expect(service.evaluateSentiment(undefined)).rejects.toBeInstanceOf(InvalidInputError);
      expect(search.searchTexts).not.toHaveBeenCalled();
    });
  });

  describe('analyzeSubjectSentiment', () => {
    it('reads posts for a symbol with the market labels', async () => {
      const snapshot = await service.analyzeSubjectSentiment('TSLA');

      expect(snapshot).toEqual({
        subject: 'TSLA',
        score: 0.4,
        label: 'bullish',
        itemCount: 2,
        topics: ['stock market'],
        priceMentions: {},
        bullishRatio: 0.5,
      });
    });

    it('builds a keyword query from a keyword list', async () => {
      const snapshot = await service.analyzeSubjectSentiment(['Rate Cut', 'inflation']);

      expect(search.searchTexts).toHaveBeenCalledWith('(inflation OR "rate cut") lang:en -is:retweet', 100);
      expect(snapshot.subject).toBe('inflation, rate cut');
      expect(snapshot.score).toBe(0.5);
      expect(snapshot.bullishRatio).toBe(1);
    });

    it('caches snapshots per subject and limit', async () => {
      await service.analyzeSubjectSentiment('TSLA');
      await service.analyzeSubjectSentiment('tsla');
      expect(search.searchTexts).toHaveBeenCalledTimes(1);

      await service.analyzeSubjectSentiment('TSLA', 20);
      expect(search.searchTexts).toHaveBeenCalledTimes(2);
    });

    it('serves an expired snapshot while search is rate limited', async () => {
      const first = await service.analyzeSubjectSentiment('TSLA');
      vi.advanceTimersByTime(2000);
      search.searchTexts.mockRejectedValueOnce(new RateLimitedError('Twitter API', 15));

      await expect(service.analyzeSubjectSentiment('TSLA')).resolves.toBe(first);
    });
  });

  describe('analyzeMarketTrends', () => {
    it('summarizes every symbol and the overall mood', async () => {
      const trends = await service.analyzeMarketTrends(['AAPL', 'MSFT'], 20);

      expect(search.searchTexts).toHaveBeenCalledWith('$AAPL OR #AAPL lang:en -is:retweet', 20);
      expect(search.searchTexts).toHaveBeenCalledWith('$MSFT OR #MSFT lang:en -is:retweet', 20);
      expect(Object.keys(trends.marketInsights)).toEqual(['AAPL', 'MSFT']);
      expect(trends.marketInsights.AAPL.sentimentScore).toBeCloseTo(0.3);
      expect(trends.marketInsights.AAPL.priceMentions).toEqual({ '$150': 1, '$160': 1 });
      expect(trends.marketInsights.MSFT.postCount).toBe(1);
      expect(trends.marketMood).toBe('neutral');
      expect(trends.sectorSentiment).toBe('neutral');
      expect(trends.correlatedTopics).toEqual(['stock market']);
    });

    it('validates the post count', async () => {
      await expect(service.analyzeMarketTrends(['AAPL'], 0)).rejects.toBeInstanceOf(InvalidInputError);
      await expect(service.analyzeMarketTrends(['AAPL'], 101)).rejects.toBeInstanceOf(InvalidInputError);
      await expect(service.analyzeMarketTrends([], 10)).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe('monitorMarket', () => {
    it('reports per-symbol sentiment and mentioned price levels', async () => {
      const report = await service.monitorMarket(['aapl', 'TSLA']);

      expect(report.symbols).toEqual(['AAPL', 'TSLA']);
      expect(search.searchTexts).toHaveBeenCalledWith('$AAPL OR #AAPL lang:en -is:retweet', 50);
      expect(report.sentimentBySymbol.AAPL).toBeCloseTo(0.3);
      expect(report.sentimentBySymbol.TSLA).toBeCloseTo(0.4);
      expect(report.overallMarketSentiment).toBe('bullish');
      expect(report.trendingTopics).toEqual(['stock market']);
      expect(report.priceSentimentCorrelation).toEqual({
        AAPL: { avgMentionedPrice: 155, sentimentScore: report.sentimentBySymbol.AAPL },
      });
    });
  });

  describe('analyzeText', () => {
    it('scores a single text with polarity labels', () => {
      expect(service.analyzeText('decent quarter')).toEqual({
        text: 'decent quarter',
        sentiment: 'positive',
        polarity: 0.5,
        subjectivity: 0.5,
      });
      expect(service.analyzeText('flat day').sentiment).toBe('neutral');
    });

    it('rejects empty and oversized text', () => {
      expect(() => service.analyzeText('   ')).toThrow(InvalidInputError);
      expect(() => service.analyzeText('x'.repeat(5001))).toThrow(InvalidInputError);
      expect(() => service.analyzeText(42)).toThrow(InvalidInputError);
    });
  });

  describe('getStockInfo', () => {
    it('passes the normalized symbol to the price source', async () => {
      const info = await service.getStockInfo('msft');

      expect(prices.getStockInfo).toHaveBeenCalledWith('MSFT');
      expect(info.companyName).toBe('Example Corp');
    });
  });
});
