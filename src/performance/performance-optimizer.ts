/**
 * Performance Optimizer
 *
 * Gatekeeper in front of the expensive collaborators (screen OCR and web
 * search). Provides:
 * - Per-minute rate limits for OCR and web calls
 * - Short-lived caches for OCR text, web results and OCR decisions
 * - Suppression of web searches similar to one already cached
 * - Web-search parameter tuning by query length and wording
 *
 * Every operation is local and synchronous; none of them throws.
 */

import type { GateResult, WebSearchParams } from '../types.js';
import { ConfigurationError } from '../errors.js';
import type { PipelineHooks } from '../hooks.js';
import { Logger, defaultLogger } from '../logger.js';
import { OPTIMIZER_VOCABULARY as VOCAB, matchTerms } from '../vocabulary.js';
import { hashContent, jaccardSimilarity, wordSet } from '../utils.js';
import { SlidingWindowRateLimiter } from './rate-limiter.js';
import { TtlCache } from './ttl-cache.js';

export enum CacheKind {
  OCR_RESULT = 'ocr_result',
  WEB_SEARCH = 'web_search',
  CONTEXT_DECISION = 'context_decision',
}

/**
 * Cache payloads, tagged by kind
 */
export type CachedPayload =
  | { kind: CacheKind.OCR_RESULT; text: string }
  | { kind: CacheKind.WEB_SEARCH; query: string; results: string }
  | { kind: CacheKind.CONTEXT_DECISION; useOcr: boolean };

export interface CachedWebSearch {
  query: string;
  results: string;
}

export const CACHE_TTL_SECONDS: Record<CacheKind, number> = {
  [CacheKind.OCR_RESULT]: 60,
  [CacheKind.WEB_SEARCH]: 300,
  [CacheKind.CONTEXT_DECISION]: 30,
};

export interface PerformanceMetrics {
  ocrCallsSaved: number;
  webCallsSaved: number;
  cacheHits: number;
  cacheMisses: number;
}

export interface CacheStats {
  totalEntries: number;
  hits: number;
  misses: number;
  hitRate: number;
  ocrCallsSaved: number;
  webCallsSaved: number;
}

export interface PerformanceOptimizerOptions {
  /** OCR calls allowed per minute (default: 10) */
  ocrRateLimit?: number;

  /** Web searches allowed per minute (default: 20) */
  webRateLimit?: number;

  /** Cache entries kept after a cleanup (default: 1000) */
  maxCacheSize?: number;

  /** Queries shorter than this never pass a gate (default: 3) */
  minQueryLength?: number;

  /** Word-set Jaccard similarity at which a cached web query counts as the same (default: 0.8) */
  similarQueryThreshold?: number;

  logger?: Logger;
  hooks?: PipelineHooks;
}

export class PerformanceOptimizer {
  private cache: TtlCache<CachedPayload>;
  private ocrLimiter: SlidingWindowRateLimiter;
  private webLimiter: SlidingWindowRateLimiter;
  private metrics: PerformanceMetrics = createInitialMetrics();
  private minQueryLength: number;
  private similarQueryThreshold: number;
  private logger: Logger;
  private hooks?: PipelineHooks;

  constructor(options: PerformanceOptimizerOptions = {}) {
    const ocrRateLimit = options.ocrRateLimit ?? 10;
    const webRateLimit = options.webRateLimit ?? 20;
    const maxCacheSize = options.maxCacheSize ?? 1000;

    requirePositiveInteger('ocrRateLimit', ocrRateLimit);
    requirePositiveInteger('webRateLimit', webRateLimit);
    requirePositiveInteger('maxCacheSize', maxCacheSize);

    this.logger = (options.logger ?? defaultLogger).child('optimizer');
    this.hooks = options.hooks;
    this.minQueryLength = options.minQueryLength ?? 3;
    this.similarQueryThreshold = options.similarQueryThreshold ?? 0.8;
    this.ocrLimiter = new SlidingWindowRateLimiter(ocrRateLimit);
    this.webLimiter = new SlidingWindowRateLimiter(webRateLimit);
    this.cache = new TtlCache<CachedPayload>({
      maxSize: maxCacheSize,
      onCleanup: stats => this.logger.info('Cache cleanup', stats),
    });
  }

  /**
   * Decide whether a screen capture + OCR is worth running for a query
   */
  shouldUseOcr(query: string, windowInfo: string = '', force: boolean = false): GateResult {
    if (force) {
      return { allowed: true, reason: 'Force check requested' };
    }

    if (!this.ocrLimiter.tryAcquire()) {
      this.metrics.ocrCallsSaved++;
      this.logger.warn('OCR suppressed by rate limit', { limit: this.ocrLimiter.limit });
      return { allowed: false, reason: 'OCR rate limit exceeded' };
    }

    if (query.trim().length < this.minQueryLength) {
      return { allowed: false, reason: 'Query too short for OCR' };
    }

    const queryLower = query.toLowerCase();
    const words = wordSet(queryLower);

    if (matchTerms(queryLower, words, VOCAB.genericPatterns).length > 0 &&
        matchTerms(queryLower, words, VOCAB.genericScreenIndicators).length === 0) {
      return { allowed: false, reason: 'Generic query without screen context indicators' };
    }

    const key = cacheKey(CacheKind.CONTEXT_DECISION, query, windowInfo);
    const cached = this.cache.get(key);
    if (cached?.kind === CacheKind.CONTEXT_DECISION) {
      this.recordHit(CacheKind.CONTEXT_DECISION);
      return { allowed: cached.useOcr, reason: 'Cached decision' };
    }

    const useOcr = matchTerms(queryLower, words, VOCAB.screenContextIndicators).length > 0;
    this.store(key, { kind: CacheKind.CONTEXT_DECISION, useOcr });

    return {
      allowed: useOcr,
      reason: useOcr ? 'Screen context indicators found' : 'No screen context needed',
    };
  }

  /**
   * Decide whether a web search is worth running for a query
   */
  shouldUseWebSearch(query: string, force: boolean = false): GateResult {
    if (force) {
      return { allowed: true, reason: 'Force check requested' };
    }

    if (!this.webLimiter.tryAcquire()) {
      this.metrics.webCallsSaved++;
      this.logger.warn('Web search suppressed by rate limit', { limit: this.webLimiter.limit });
      return { allowed: false, reason: 'Web search rate limit exceeded' };
    }

    if (query.trim().length < this.minQueryLength) {
      return { allowed: false, reason: 'Query too short for web search' };
    }

    const queryLower = query.toLowerCase();
    const words = wordSet(queryLower);

    if (matchTerms(queryLower, words, VOCAB.webIndicators).length > 0) {
      return { allowed: true, reason: 'Time-sensitive or external information needed' };
    }

    if (matchTerms(queryLower, words, VOCAB.localScreenPhrases).length > 0) {
      return { allowed: false, reason: 'Local screen query - no web search needed' };
    }

    const similar = this.findSimilarCachedSearch(words);
    if (similar !== null) {
      this.recordHit(CacheKind.WEB_SEARCH);
      return {
        allowed: false,
        reason: `Similar query recently cached: ${similar.query.slice(0, 50)}...`,
        cachedQuery: similar.query,
      };
    }

    const hasQuestion = matchTerms(queryLower, words, VOCAB.questionWords).length > 0;
    if (hasQuestion && countWords(query) > 3) {
      return { allowed: true, reason: 'Complex question likely needs external information' };
    }

    return { allowed: false, reason: 'Simple query - using AI knowledge only' };
  }

  getCachedOcrResult(windowInfo: string): string | null {
    const cached = this.cache.get(cacheKey(CacheKind.OCR_RESULT, windowInfo));
    if (cached?.kind === CacheKind.OCR_RESULT) {
      this.recordHit(CacheKind.OCR_RESULT);
      this.metrics.ocrCallsSaved++;
      return cached.text;
    }

    this.recordMiss(CacheKind.OCR_RESULT);
    return null;
  }

  cacheOcrResult(windowInfo: string, text: string): void {
    this.store(cacheKey(CacheKind.OCR_RESULT, windowInfo), { kind: CacheKind.OCR_RESULT, text });
  }

  getCachedWebResult(query: string, params: WebSearchParams = {}): string | null {
    const cached = this.cache.get(cacheKey(CacheKind.WEB_SEARCH, query, paramsKey(params)));
    if (cached?.kind === CacheKind.WEB_SEARCH) {
      this.recordHit(CacheKind.WEB_SEARCH);
      this.metrics.webCallsSaved++;
      return cached.results;
    }

    this.recordMiss(CacheKind.WEB_SEARCH);
    return null;
  }

  cacheWebResult(query: string, results: string, params: WebSearchParams = {}): void {
    this.store(
      cacheKey(CacheKind.WEB_SEARCH, query, paramsKey(params)),
      { kind: CacheKind.WEB_SEARCH, query, results }
    );
  }

  /**
   * Results of a live cached search similar enough to stand in for `query`.
   * Serving them counts as a saved web call.
   */
  getSimilarCachedWebResult(query: string): CachedWebSearch | null {
    const similar = this.findSimilarCachedSearch(wordSet(query.toLowerCase()));
    if (similar === null) {
      return null;
    }

    this.metrics.webCallsSaved++;
    this.logger.debug('Serving similar cached search', { cachedQuery: similar.query });
    return similar;
  }

  /**
   * Fewer results for short queries; a recency window from the wording
   */
  optimizeWebSearchParams(query: string, base: WebSearchParams = {}): WebSearchParams {
    const optimized: WebSearchParams = { ...base };
    const words = countWords(query);

    if (words <= 3) {
      optimized.maxResults = Math.min(base.maxResults ?? 5, 3);
    } else if (words <= 6) {
      optimized.maxResults = Math.min(base.maxResults ?? 5, 5);
    } else {
      optimized.maxResults = Math.min(base.maxResults ?? 10, 8);
    }

    const queryWords = wordSet(query);
    if (queryWords.has('latest') || queryWords.has('recent')) {
      optimized.timelimit = 'd';
    } else if (queryWords.has('news')) {
      optimized.timelimit = 'w';
    } else {
      optimized.timelimit = 'm';
    }

    return optimized;
  }

  cleanupCache(): void {
    this.cache.cleanup();
  }

  getCacheStats(): CacheStats {
    const { cacheHits, cacheMisses } = this.metrics;
    return {
      totalEntries: this.cache.size,
      hits: cacheHits,
      misses: cacheMisses,
      hitRate: cacheHits / Math.max(1, cacheHits + cacheMisses),
      ocrCallsSaved: this.metrics.ocrCallsSaved,
      webCallsSaved: this.metrics.webCallsSaved,
    };
  }

  getPerformanceMetrics(): Readonly<PerformanceMetrics> {
    return { ...this.metrics };
  }

  /**
   * Empty the cache and rate windows and zero the metrics
   */
  clearAll(): void {
    this.cache.clear();
    this.ocrLimiter.reset();
    this.webLimiter.reset();
    this.metrics = createInitialMetrics();
  }

  private findSimilarCachedSearch(queryWords: ReadonlySet<string>): CachedWebSearch | null {
    for (const payload of this.cache.values()) {
      if (payload.kind !== CacheKind.WEB_SEARCH) continue;

      if (jaccardSimilarity(queryWords, wordSet(payload.query)) >= this.similarQueryThreshold) {
        return { query: payload.query, results: payload.results };
      }
    }
    return null;
  }

  private store(key: string, payload: CachedPayload): void {
    this.cache.set(key, payload, CACHE_TTL_SECONDS[payload.kind]);
  }

  private recordHit(kind: CacheKind): void {
    this.metrics.cacheHits++;
    this.logger.debug('Cache hit', { kind });
    this.hooks?.emit('cacheHit', { kind, timestamp: Date.now() });
  }

  private recordMiss(kind: CacheKind): void {
    this.metrics.cacheMisses++;
    this.logger.debug('Cache miss', { kind });
    this.hooks?.emit('cacheMiss', { kind, timestamp: Date.now() });
  }
}

function createInitialMetrics(): PerformanceMetrics {
  return { ocrCallsSaved: 0, webCallsSaved: 0, cacheHits: 0, cacheMisses: 0 };
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`, { [name]: value });
  }
}

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Kind-prefixed content hash of the inputs
 */
function cacheKey(kind: CacheKind, ...parts: string[]): string {
  return `${kind}:${hashContent(parts.join('\u0000'))}`;
}

/**
 * Order-independent rendering of search params
 */
function paramsKey(params: WebSearchParams): string {
  return Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => `${name}=${String(value)}`)
    .join('&');
}
