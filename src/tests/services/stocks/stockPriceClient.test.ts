import '../../mocks/logger.mock';
import { createHttpMock, httpError, okResponse } from '../../mocks/http.mock';

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StockPriceClient, summarizeCloses } from '@/services/stocks/stockPriceClient';
import { NotFoundError, RateLimitedError, UpstreamUnavailableError } from '@/utils/errors';

const chart = (closes: Array<number | null>, meta: Record<string, string> = {}) => okResponse({
  chart: {
    result: [{ meta, indicators: { quote: [{ close: closes }] } }],
    error: null,
  },
});

describe('summarizeCloses', () => {
  it('returns null without closes', () => {
    expect(summarizeCloses([])).toBeNull();
  });

  it('reads an upward trend when the last close is above the mean', () => {
    const signal = summarizeCloses([10, 20]);

    expect(signal?.trend).toBe('upward');
    // sample std 7.0711 over mean 15
    expect(signal?.volatility).toBeCloseTo(47.1405, 3);
  });

  it('reads a downward trend when the last close is at or below the mean', () => {
    expect(summarizeCloses([20, 10])?.trend).toBe('downward');
    expect(summarizeCloses([10, 10])).toEqual({ trend: 'downward', volatility: 0 });
  });

  it('reports zero volatility for a single close', () => {
    expect(summarizeCloses([42])).toEqual({ trend: 'downward', volatility: 0 });
  });
});

describe('StockPriceClient', () => {
  let http: ReturnType<typeof createHttpMock>;
  let client: StockPriceClient;

  beforeEach(() => {
    vi.clearAllMocks();
    http = createHttpMock();
    client = new StockPriceClient({ http });
  });

  it('requests one month of daily closes', async () => {
    http.get.mockResolvedValue(chart([100, 110]));

    await client.getPriceSignal('AAPL');

    expect(http.get).toHaveBeenCalledWith('/v8/finance/chart/AAPL', {
      params: { range: '1mo', interval: '1d' },
    });
  });

  it('skips missing closes when summarizing', async () => {
    http.get.mockResolvedValue(chart([10, null, 20]));

    const signal = await client.getPriceSignal('AAPL');

    expect(signal?.trend).toBe('upward');
    expect(signal?.volatility).toBeCloseTo(47.1405, 3);
  });

  it('returns null when the symbol has no history', async () => {
    http.get.mockResolvedValueOnce(okResponse({ chart: { result: null, error: { code: 'Not Found' } } }));
    await expect(client.getPriceSignal('ZZZZ')).resolves.toBeNull();

    http.get.mockRejectedValueOnce(httpError(404));
    await expect(client.getPriceSignal('ZZZZ')).resolves.toBeNull();
  });

  it('builds stock info from the last two closes', async () => {
    http.get.mockResolvedValue(chart([90, 100, null, 110], { longName: 'Example Corp', currency: 'EUR' }));

    await expect(client.getStockInfo('EXM')).resolves.toEqual({
      symbol: 'EXM',
      currentPrice: 110,
      priceChange: 10,
      priceChangePct: 10,
      companyName: 'Example Corp',
      industry: 'N/A',
      marketCap: 0,
      currency: 'EUR',
    });
  });

  it('falls back to the short name and USD', async () => {
    http.get.mockResolvedValue(chart([100, 50], { shortName: 'EXM Inc' }));

    const info = await client.getStockInfo('EXM');

    expect(info.companyName).toBe('EXM Inc');
    expect(info.currency).toBe('USD');
    expect(info.priceChangePct).toBe(-50);
  });

  it('needs at least two closes for stock info', async () => {
    http.get.mockResolvedValue(chart([100]));

    await expect(client.getStockInfo('EXM')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('translates upstream failures', async () => {
    http.get.mockRejectedValueOnce(httpError(500));
    await expect(client.getPriceSignal('AAPL')).rejects.toThrow('Price history API unavailable: HTTP 500');

    http.get.mockRejectedValueOnce(httpError(429));
    await expect(client.getPriceSignal('AAPL')).rejects.toBeInstanceOf(RateLimitedError);

    http.get.mockRejectedValueOnce(httpError(403));
    await expect(client.getStockInfo('AAPL')).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });
});
