import { isRateLimited } from '@/utils/errors';
import { createLogger } from '@/utils/logger';
import type { TtlCache } from './ttlCache';

const log = createLogger('cache.staleFallback');

/**
 * Runs `work`; if it fails with a rate-limit error, answers with the expired
 * cache entry for `key` when one is still held. Any other failure, or a
 * rate limit with nothing cached, propagates unchanged.
 */
export async function withStaleFallback<T>(
  cache: TtlCache<T>,
  key: string,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (isRateLimited(error)) {
      const stale = cache.getStale(key);
      if (stale !== null) {
        log.warn('Upstream rate limited, serving stale cache entry', {
          key,
          ageMs: cache.ageMs(key),
          retryAfter: error.retryAfterSeconds,
        });
        return stale;
      }
    }
    throw error;
  }
}
