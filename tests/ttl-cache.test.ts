import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TtlCache } from '../src/performance/ttl-cache.js';
import { SlidingWindowRateLimiter } from '../src/performance/rate-limiter.js';

describe('TtlCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return stored values until their TTL has elapsed', () => {
    const cache = new TtlCache<string>();
    cache.set('a', 'alpha', 10);

    vi.advanceTimersByTime(9_999);
    expect(cache.get('a')).toBe('alpha');

    vi.advanceTimersByTime(1);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should fall back to the default TTL', () => {
    const cache = new TtlCache<string>({ defaultTtlSeconds: 5 });
    cache.set('a', 'alpha');

    vi.advanceTimersByTime(4_999);
    expect(cache.get('a')).toBe('alpha');

    vi.advanceTimersByTime(1);
    expect(cache.get('a')).toBeUndefined();
  });

  it('should skip expired entries when iterating values', () => {
    const cache = new TtlCache<string>();
    cache.set('short', 'gone soon', 1);
    cache.set('long', 'still here', 60);

    vi.advanceTimersByTime(1_000);
    expect([...cache.values()]).toEqual(['still here']);
  });

  it('should evict least recently accessed entries past the size slack', () => {
    const onCleanup = vi.fn();
    const cache = new TtlCache<string>({ maxSize: 10, onCleanup });

    for (let i = 0; i <= 10; i++) {
      cache.set(`k${i}`, `v${i}`);
      vi.advanceTimersByTime(1);
    }
    expect(cache.size).toBe(11);

    cache.get('k0');
    cache.set('k11', 'v11');

    expect(onCleanup).toHaveBeenCalledWith({ expired: 0, evicted: 2, size: 10 });
    expect([...cache.values()]).toEqual(['v0', 'v3', 'v4', 'v5', 'v6', 'v7', 'v8', 'v9', 'v10', 'v11']);
  });

  it('should drop expired entries before evicting', () => {
    const onCleanup = vi.fn();
    const cache = new TtlCache<number>({ onCleanup });
    cache.set('old', 1, 1);
    cache.set('new', 2, 60);

    vi.advanceTimersByTime(2_000);
    cache.cleanup();

    expect(onCleanup).toHaveBeenCalledWith({ expired: 1, evicted: 0, size: 1 });
    expect([...cache.values()]).toEqual([2]);
  });

  it('should not report a cleanup that removed nothing', () => {
    const onCleanup = vi.fn();
    const cache = new TtlCache<number>({ onCleanup });
    cache.set('a', 1);

    cache.cleanup();
    expect(onCleanup).not.toHaveBeenCalled();
  });

  it('should clear every entry', () => {
    const cache = new TtlCache<number>();
    cache.set('a', 1);
    cache.set('b', 2);

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });
});

describe('SlidingWindowRateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should allow up to the limit within the window', () => {
    const limiter = new SlidingWindowRateLimiter(3, 1_000);

    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
    expect(limiter.count()).toBe(3);
  });

  it('should free slots as calls leave the window', () => {
    const limiter = new SlidingWindowRateLimiter(2, 1_000);

    limiter.tryAcquire();
    vi.advanceTimersByTime(500);
    limiter.tryAcquire();
    expect(limiter.tryAcquire()).toBe(false);

    vi.advanceTimersByTime(500);
    expect(limiter.count()).toBe(1);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
  });

  it('should default to a one-minute window', () => {
    const limiter = new SlidingWindowRateLimiter(1);
    limiter.tryAcquire();

    vi.advanceTimersByTime(59_999);
    expect(limiter.tryAcquire()).toBe(false);

    vi.advanceTimersByTime(1);
    expect(limiter.tryAcquire()).toBe(true);
  });

  it('should forget all calls on reset', () => {
    const limiter = new SlidingWindowRateLimiter(1);
    limiter.tryAcquire();

    limiter.reset();
    expect(limiter.count()).toBe(0);
    expect(limiter.tryAcquire()).toBe(true);
  });
});
