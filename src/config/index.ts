import dotenv from 'dotenv';

dotenv.config();

export interface AppConfig {
  port: number;
  logLevel: string;
  twitter: {
    bearerToken: string;
    baseUrl: string;
    searchLimit: number;
  };
  stocks: {
    baseUrl: string;
  };
  upstreamTimeoutMs: number;
  cacheTtlMs: number;
  rateLimit: {
    limit: number;
    windowMs: number;
  };
  strongThreshold: number;
  maxTopics: number;
}

type Env = Record<string, string | undefined>;

const readNumber = (env: Env, name: string, fallback: number, min = 0): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`${name} must be a number >= ${min}, got "${raw}"`);
  }
  return value;
};

const readInteger = (env: Env, name: string, fallback: number, min = 1): number => {
  const value = readNumber(env, name, fallback, min);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${env[name]}"`);
  }
  return value;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const strongThreshold = readNumber(env, 'STRONG_SENTIMENT_THRESHOLD', 0.2);
  if (strongThreshold > 1) {
    throw new Error(`STRONG_SENTIMENT_THRESHOLD must be <= 1, got "${env.STRONG_SENTIMENT_THRESHOLD}"`);
  }

  return {
    port: readInteger(env, 'PORT', 4000),
    logLevel: env.LOG_LEVEL || 'info',
    twitter: {
      bearerToken: env.TWITTER_BEARER_TOKEN || '',
      baseUrl: (env.TWITTER_API_BASE_URL || 'https://api.twitter.com/2').replace(/\/$/, ''),
      // recent search accepts 10..100 results per page
      searchLimit: Math.min(100, Math.max(10, readInteger(env, 'SEARCH_RESULT_LIMIT', 100))),
    },
    stocks: {
      baseUrl: (env.STOCK_API_BASE_URL || 'https://query1.finance.yahoo.com').replace(/\/$/, ''),
    },
    upstreamTimeoutMs: readInteger(env, 'UPSTREAM_TIMEOUT_MS', 10_000),
    cacheTtlMs: readNumber(env, 'SENTIMENT_CACHE_TTL_SECONDS', 3600) * 1000,
    rateLimit: {
      limit: readInteger(env, 'RATE_LIMIT_REQUESTS', 100),
      windowMs: readNumber(env, 'RATE_LIMIT_WINDOW_SECONDS', 3600, 1) * 1000,
    },
    strongThreshold,
    maxTopics: readInteger(env, 'MAX_TOPICS', 5),
  };
};
