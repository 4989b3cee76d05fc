import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { AppConfig } from '../config';
import { RateLimiter } from '../services/rateLimit/rateLimiter';
import { MarketSentimentService, createMarketSentimentService } from '../services/sentiment';
import { RateLimitedError, SentimentServiceError, errorMessage, type FailureBody } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('api.server');

const SERVICE_NAME = 'market-sentiment-service';
const VERSION = '1.0.0';
const IDLE_CLIENT_SWEEP_MS = 5 * 60 * 1000;
const ENVELOPE_METADATA = { version: VERSION, provider: SERVICE_NAME };

export interface AppDependencies {
  service: MarketSentimentService;
  rateLimiter: RateLimiter;
}

const CAPABILITIES = [
  {
    name: 'analyze_market_sentiment',
    description: 'Bullish / bearish sentiment of recent posts for a stock symbol or keyword list',
    input: { symbol: 'string (e.g. "AAPL")', keywords: 'string[] (alternative to symbol)' },
  },
  {
    name: 'analyze_market_trends',
    description: 'Sentiment, topics and price mentions across several symbols',
    input: { symbols: 'string[]', min_tweets: 'integer 1-100 (default 50)' },
  },
  {
    name: 'monitor_market',
    description: 'Watchlist sentiment with trending topics and mentioned price levels',
    input: { watchlist: 'string[]' },
  },
  {
    name: 'analyze',
    description: 'Post sentiment combined with the one-month price trend for a symbol',
    input: { symbol: 'string' },
  },
] as const;

const bodyOf = (req: Request): Record<string, unknown> => {
  const body: unknown = req.body;
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? Object.fromEntries(Object.entries(body)) : {};
};

const clientIdOf = (req: Request): string => req.ip || req.socket.remoteAddress || 'unknown';

// Express 4 does not forward rejected promises to the error handler
const asyncHandler = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export const rateLimitMiddleware = (rateLimiter: RateLimiter): RequestHandler => (req, res, next) => {
  const clientId = clientIdOf(req);

  if (rateLimiter.admit(clientId)) {
    res.setHeader('X-RateLimit-Remaining', String(rateLimiter.remaining(clientId)));
    next();
    return;
  }

  const retryAfter = Math.ceil(rateLimiter.retryAfterMs(clientId) / 1000);
  logger.warn('Client rate limited', { clientId, path: req.path, retryAfter });
  next(new RateLimitedError('Request', retryAfter));
};

interface Failure {
  statusCode: number;
  body: FailureBody | { error: 'internal'; message: string };
  retryAfter?: number;
}

const failureOf = (err: unknown): Failure => {
  if (err instanceof SentimentServiceError) {
    return {
      statusCode: err.statusCode,
      body: err.toJSON(),
      retryAfter: err instanceof RateLimitedError ? err.retryAfterSeconds : undefined,
    };
  }

  // malformed JSON from express.json()
  if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
    return { statusCode: 400, body: { error: 'invalid_input', message: 'Request body is not valid JSON' } };
  }

  return { statusCode: 500, body: { error: 'internal', message: 'An internal server error occurred.' } };
};

const prepareFailure = (req: Request, res: Response, err: unknown): Failure => {
  const failure = failureOf(err);
  if (failure.retryAfter !== undefined) {
    res.setHeader('Retry-After', String(failure.retryAfter));
  }
  if (failure.statusCode === 500) {
    logger.error('Unhandled error in request', { path: req.path, error: err });
  } else {
    logger.info('Request failed', { path: req.path, error: errorMessage(err) });
  }
  return failure;
};

const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const failure = prepareFailure(req, res, err);
  res.status(failure.statusCode).json(failure.body);
};

// Tool-calling clients read every outcome from the same envelope
const envelopeErrorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const failure = prepareFailure(req, res, err);
  res.status(failure.statusCode).json({ status: 'error', error: failure.body, metadata: ENVELOPE_METADATA });
};

export function createApp({ service, rateLimiter }: AppDependencies): express.Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  app.get('/', (_, res) => {
    res.status(200).json({
      status: 'ok',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: VERSION,
    });
  });

  app.get(['/api/health', '/health'], (_, res) => {
    res.status(200).json({
      status: 'healthy',
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: process.memoryUsage(),
      env: process.env.NODE_ENV || 'development',
    });
  });

  app.get(['/mcp/capabilities', '/_mcp/capabilities'], (_, res) => {
    res.json({ version: VERSION, provider: SERVICE_NAME, capabilities: CAPABILITIES });
  });

  const limited = rateLimitMiddleware(rateLimiter);

  app.post('/mcp/analyze_market_sentiment', limited, asyncHandler(async (req, res) => {
    const { symbol, keywords } = bodyOf(req);
    res.json(await service.analyzeSubjectSentiment(keywords !== undefined ? keywords : symbol));
  }));

  app.post('/mcp/analyze_market_trends', limited, asyncHandler(async (req, res) => {
    const { symbols, min_tweets } = bodyOf(req);
    res.json(await service.analyzeMarketTrends(symbols, min_tweets));
  }));

  app.post('/mcp/monitor_market', limited, asyncHandler(async (req, res) => {
    res.json(await service.monitorMarket(bodyOf(req).watchlist));
  }));

  app.post('/analyze', limited, asyncHandler(async (req, res) => {
    res.json(await service.evaluateSentiment(bodyOf(req).symbol));
  }));

  app.get('/stock/:symbol', limited, asyncHandler(async (req, res) => {
    res.json(await service.getStockInfo(req.params.symbol));
  }));

  app.post('/sentiment', limited, (req, res, next) => {
    try {
      res.json(service.analyzeText(bodyOf(req).text));
    } catch (error) {
      next(error);
    }
  });

  // Envelope variant for tool-calling clients
  app.post('/_mcp/analyze', limited, asyncHandler(async (req, res) => {
    const data = await service.evaluateSentiment(bodyOf(req).symbol);
    res.json({ status: 'success', data, metadata: ENVELOPE_METADATA });
  }));

  app.use('/_mcp', envelopeErrorHandler);
  app.use(errorHandler);
  return app;
}

export function startServer(config: AppConfig): Server {
  const service = createMarketSentimentService(config);
  const rateLimiter = new RateLimiter(config.rateLimit);
  const app = createApp({ service, rateLimiter });

  const sweep = setInterval(() => {
    const removed = rateLimiter.purgeIdle();
    if (removed > 0) {
      logger.debug(`Purged ${removed} idle rate-limit clients`);
    }
  }, IDLE_CLIENT_SWEEP_MS);
  sweep.unref();

  const server = app.listen(config.port, () => {
    logger.info(`API server listening on port ${config.port}`);
  });
  server.on('close', () => clearInterval(sweep));
  return server;
}
