import axios, { type AxiosInstance } from 'axios';
import { createLogger } from '@/utils/logger';
import { UpstreamUnavailableError } from '@/utils/errors';
import { translateUpstreamError } from '@/services/upstream';

const log = createLogger('twitter.search');

const SOURCE = 'Twitter API';
const MIN_RESULTS = 10;
const MAX_RESULTS = 100;

export interface RecentPost {
  id: string;
  text: string;
  createdAt?: string;
}

interface RecentSearchResponse {
  data?: Array<{
    id: string;
    text: string;
    created_at?: string;
  }>;
  meta?: {
    result_count?: number;
    next_token?: string;
  };
}

export interface TwitterSearchClientOptions {
  bearerToken: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: Pick<AxiosInstance, 'get'>;
}

/**
 * Recent-search client for the Twitter v2 API.
 * Rate limits and timeouts surface as typed service errors; nothing is retried here.
 */
export class TwitterSearchClient {
  private readonly http: Pick<AxiosInstance, 'get'>;
  private readonly bearerToken: string;

  constructor(options: TwitterSearchClientOptions) {
    this.bearerToken = options.bearerToken;
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? 'https://api.twitter.com/2',
      timeout: options.timeoutMs ?? 10_000,
    });
  }

  isConfigured(): boolean {
    return this.bearerToken !== '';
  }

  async searchRecent(query: string, limit: number = MAX_RESULTS): Promise<RecentPost[]> {
    if (!this.isConfigured()) {
      throw new UpstreamUnavailableError(SOURCE, 'bearer token not configured', 503);
    }

    const maxResults = Math.min(MAX_RESULTS, Math.max(MIN_RESULTS, Math.floor(limit)));

    try {
      log.debug('Searching recent posts', { query, maxResults });
      const response = await this.http.get<RecentSearchResponse>('/tweets/search/recent', {
        headers: { Authorization: `Bearer ${this.bearerToken}` },
        params: {
          query,
          max_results: maxResults,
          'tweet.fields': 'created_at,public_metrics',
        },
      });

      const posts = (response.data.data ?? []).map((tweet) => ({
        id: tweet.id,
        text: tweet.text,
        createdAt: tweet.created_at,
      }));

      log.info(`Fetched ${posts.length} posts`, { query });
      return posts;
    } catch (error) {
      const failure = translateUpstreamError(SOURCE, error);
      log.warn('Recent search failed', { query, kind: failure.kind, error: failure.message });
      throw failure;
    }
  }

  async searchTexts(query: string, limit?: number): Promise<string[]> {
    const posts = await this.searchRecent(query, limit);
    return posts.map((post) => post.text);
  }
}
