import axios, { type AxiosInstance } from 'axios';
import { createLogger } from '@/utils/logger';
import { NotFoundError } from '@/utils/errors';
import { translateUpstreamError } from '@/services/upstream';
import type { PriceSignal, PriceTrend } from '@/services/sentiment/marketAssessment';

const log = createLogger('stocks.priceClient');

const SOURCE = 'Price history API';

interface ChartResult {
  meta?: {
    symbol?: string;
    currency?: string;
    longName?: string;
    shortName?: string;
  };
  indicators?: {
    quote?: Array<{
      close?: Array<number | null>;
    }>;
  };
}

interface ChartResponse {
  chart?: {
    result?: ChartResult[] | null;
    error?: { code?: string; description?: string } | null;
  };
}

export interface StockInfo {
  symbol: string;
  currentPrice: number;
  priceChange: number;
  priceChangePct: number;
  companyName: string;
  industry: string;
  marketCap: number;
  currency: string;
}

export interface StockPriceClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  range?: string;
  http?: Pick<AxiosInstance, 'get'>;
}

interface PriceHistory {
  closes: number[];
  meta: NonNullable<ChartResult['meta']>;
}

/**
 * Trend is upward when the last close sits above the period mean.
 * Volatility is the sample standard deviation over the mean, in percent.
 */
export function summarizeCloses(closes: readonly number[]): PriceSignal | null {
  if (closes.length === 0) return null;

  const mean = closes.reduce((sum, c) => sum + c, 0) / closes.length;
  const last = closes[closes.length - 1];
  const trend: PriceTrend = last > mean ? 'upward' : 'downward';

  if (closes.length < 2 || mean === 0) {
    return { trend, volatility: 0 };
  }

  const variance = closes.reduce((sum, c) => sum + (c - mean) ** 2, 0) / (closes.length - 1);
  return { trend, volatility: (Math.sqrt(variance) / mean) * 100 };
}

export class StockPriceClient {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly range: string;

  constructor(options: StockPriceClientOptions = {}) {
    this.range = options.range ?? '1mo';
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? 'https://query1.finance.yahoo.com',
      timeout: options.timeoutMs ?? 10_000,
    });
  }

  /** Resolves null when the symbol has no price history. */
  async getPriceSignal(symbol: string): Promise<PriceSignal | null> {
    const history = await this.fetchHistory(symbol);
    return history ? summarizeCloses(history.closes) : null;
  }

  async getStockInfo(symbol: string): Promise<StockInfo> {
    const history = await this.fetchHistory(symbol);
    if (!history || history.closes.length < 2) {
      throw new NotFoundError(symbol, 'not enough price history');
    }

    const { closes, meta } = history;
    const current = closes[closes.length - 1];
    const previous = closes[closes.length - 2];
    const priceChange = current - previous;

    return {
      symbol,
      currentPrice: current,
      priceChange,
      priceChangePct: previous === 0 ? 0 : (priceChange / previous) * 100,
      companyName: meta.longName ?? meta.shortName ?? 'N/A',
      // chart metadata carries no profile fields
      industry: 'N/A',
      marketCap: 0,
      currency: meta.currency ?? 'USD',
    };
  }

  private async fetchHistory(symbol: string): Promise<PriceHistory | null> {
    try {
      const response = await this.http.get<ChartResponse>(`/v8/finance/chart/${encodeURIComponent(symbol)}`, {
        params: { range: this.range, interval: '1d' },
      });

      const result = response.data.chart?.result?.[0];
      const closes = (result?.indicators?.quote?.[0]?.close ?? []).filter(
        (c): c is number => typeof c === 'number' && Number.isFinite(c)
      );

      if (!result || closes.length === 0) {
        log.info('No price history returned', { symbol });
        return null;
      }

      return { closes, meta: result.meta ?? {} };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        log.info('Symbol not known to price source', { symbol });
        return null;
      }
      const failure = translateUpstreamError(SOURCE, error);
      log.warn('Price history request failed', { symbol, kind: failure.kind, error: failure.message });
      throw failure;
    }
  }
}
