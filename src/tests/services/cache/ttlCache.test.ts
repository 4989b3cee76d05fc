import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TtlCache } from '@/services/cache/ttlCache';

describe('TtlCache', () => {
  let cache: TtlCache<number>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00Z'));
    cache = new TtlCache<number>(1000);
  });

  it('returns a value until the ttl has fully elapsed', () => {
    cache.set('a', 1);
    vi.advanceTimersByTime(1000);
    expect(cache.get('a')).toBe(1);

    vi.advanceTimersByTime(1);
    expect(cache.get('a')).toBeNull();
  });

  it('returns null for unknown keys', () => {
    expect(cache.get('missing')).toBeNull();
    expect(cache.getStale('missing')).toBeNull();
    expect(cache.ageMs('missing')).toBeNull();
  });

  it('keeps expired entries readable as stale until the next write', () => {
    cache.set('a', 1);
    vi.advanceTimersByTime(1500);

    expect(cache.get('a')).toBeNull();
    expect(cache.getStale('a')).toBe(1);
    expect(cache.size()).toBe(1);
  });

  it('sweeps expired entries on write', () => {
    cache.set('a', 1);
    vi.advanceTimersByTime(1001);
    cache.set('b', 2);

    expect(cache.size()).toBe(1);
    expect(cache.getStale('a')).toBeNull();
    expect(cache.get('b')).toBe(2);
  });

  it('overwrites an entry and restarts its clock', () => {
    cache.set('a', 1);
    vi.advanceTimersByTime(800);
    cache.set('a', 2);
    vi.advanceTimersByTime(800);

    expect(cache.get('a')).toBe(2);
    expect(cache.ageMs('a')).toBe(800);
  });

  it('serves a zero ttl entry only at the instant it was written', () => {
    const zero = new TtlCache<string>(0);
    zero.set('k', 'v');
    expect(zero.get('k')).toBe('v');

    vi.advanceTimersByTime(1);
    expect(zero.get('k')).toBeNull();
  });

  it('supports has, delete and clear', () => {
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.has('a')).toBe(true);
    expect(cache.delete('a')).toBe(true);
    expect(cache.has('a')).toBe(false);

    cache.clear();
    expect(cache.size()).toBe(0);
  });

  it('rejects invalid ttl values', () => {
    expect(() => new TtlCache(-1)).toThrow(RangeError);
    expect(() => new TtlCache(Number.NaN)).toThrow(RangeError);
    expect(new TtlCache(250).ttl).toBe(250);
  });
});
