/**
 * Context Pipeline
 *
 * One chat turn from query to prompt messages:
 * window lookup → context decision → OCR / web fetch (cached, retried,
 * circuit-broken) → fusion → history + digest → prompt messages.
 *
 * Collaborator failures never fail the turn; the source is treated as empty.
 */

import type {
  ContextDecision,
  ContextSource,
  FusedContext,
  LLMMessage,
  SafeSearch,
  ScreenTextSource,
  WebSearchParams,
  WebSearchSource,
  WindowInfoSource,
} from './types.js';
import type { AssistantConfig } from './config.js';
import { DEFAULT_SYSTEM_PROMPT } from './config.js';
import { SmartContextAnalyzer, classifyQuery, computeQuerySignals } from './analysis/smart-context-analyzer.js';
import { PerformanceOptimizer } from './performance/performance-optimizer.js';
import { DataFusion } from './fusion/data-fusion.js';
import { RelevanceScorer } from './relevance/relevance-scorer.js';
import { ConversationMemory } from './memory/conversation-memory.js';
import { buildPromptMessages } from './prompt/prompt-builder.js';
import { PipelineHooks } from './hooks.js';
import { SourceCircuitBreakers, callCollaborator, type CircuitBreakerOptions, type RetryOptions } from './retry.js';
import { wrapError } from './errors.js';
import { Logger, createLogger, defaultLogger } from './logger.js';
import { formatWebResults, formatWindowInfo } from './sources.js';

export interface PipelineSources {
  screen?: ScreenTextSource;
  web?: WebSearchSource;
  window?: WindowInfoSource;
}

export interface WebSearchDefaults {
  maxResults: number;
  safesearch: SafeSearch;
}

export interface ContextPipelineOptions {
  sources?: PipelineSources;
  systemPrompt?: string;
  optimizer?: PerformanceOptimizer;
  analyzer?: SmartContextAnalyzer;
  fusion?: DataFusion;
  memory?: ConversationMemory;
  hooks?: PipelineHooks;
  logger?: Logger;

  /** Applied to every collaborator call */
  retry?: Omit<RetryOptions, 'onRetry'>;

  /** Applied to the circuit of each source */
  circuitBreaker?: CircuitBreakerOptions;

  /** Fallbacks for web search parameters (default: 5 results, moderate) */
  webSearch?: Partial<WebSearchDefaults>;
}

export interface TurnRequest {
  query: string;

  /** Explicit source selection; skips the analyzer */
  manual?: { useOcr: boolean; useWeb: boolean };
}

export interface TurnResult {
  sessionId: string;
  decision: ContextDecision;
  windowInfo: string;
  screenText: string;
  webResults: string;
  fused: FusedContext;
  messages: LLMMessage[];
}

export class ContextPipeline {
  private sources: PipelineSources;
  private systemPrompt: string;
  private optimizer: PerformanceOptimizer;
  private analyzer: SmartContextAnalyzer;
  private fusion: DataFusion;
  private memory: ConversationMemory;
  private hooks: PipelineHooks;
  private logger: Logger;
  private retryOptions: Omit<RetryOptions, 'onRetry'>;
  private breakers: SourceCircuitBreakers;
  private webDefaults: WebSearchDefaults;

  constructor(options: ContextPipelineOptions = {}) {
    const rootLogger = options.logger ?? defaultLogger;
    this.logger = rootLogger.child('pipeline');
    this.sources = options.sources ?? {};
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.hooks = options.hooks ?? new PipelineHooks({ logger: rootLogger });
    this.optimizer = options.optimizer ?? new PerformanceOptimizer({ logger: rootLogger, hooks: this.hooks });
    this.analyzer = options.analyzer ?? new SmartContextAnalyzer({ optimizer: this.optimizer, logger: rootLogger });
    this.fusion = options.fusion ?? new DataFusion({ logger: rootLogger });
    this.memory = options.memory ?? new ConversationMemory({ logger: rootLogger });
    this.retryOptions = options.retry ?? {};
    this.breakers = new SourceCircuitBreakers(options.circuitBreaker);
    this.webDefaults = {
      maxResults: options.webSearch?.maxResults ?? 5,
      safesearch: options.webSearch?.safesearch ?? 'moderate',
    };
  }

  /**
   * Wire every component from loaded configuration
   */
  static fromConfig(
    config: Readonly<AssistantConfig>,
    sources: PipelineSources,
    options: { logger?: Logger; hooks?: PipelineHooks } = {}
  ): ContextPipeline {
    const logger = options.logger ?? createLogger({ level: config.logLevel, format: config.logFormat });
    const hooks = options.hooks ?? new PipelineHooks({ logger });
    const optimizer = new PerformanceOptimizer({
      ocrRateLimit: config.ocrRateLimit,
      webRateLimit: config.webRateLimit,
      maxCacheSize: config.maxCacheSize,
      logger,
      hooks,
    });

    return new ContextPipeline({
      sources,
      systemPrompt: config.systemPrompt,
      optimizer,
      analyzer: new SmartContextAnalyzer({ optimizer, logger }),
      fusion: new DataFusion({ scorer: new RelevanceScorer({ logger }), logger }),
      memory: new ConversationMemory({
        enabled: config.conversationMemory,
        maxContextMessages: config.maxContextMessages,
        dataRetentionHours: config.dataRetentionHours,
        autoSummarize: config.autoSummarizeContext,
        anonymize: config.anonymizeData,
        logger,
      }),
      hooks,
      logger,
      retry: { maxAttempts: config.retryAttempts },
      webSearch: {
        maxResults: config.webSearchMaxResults,
        safesearch: config.webSearchSafesearch,
      },
    });
  }

  async processTurn(request: TurnRequest): Promise<TurnResult> {
    const startedAt = Date.now();
    const { query } = request;

    const windowInfo = await this.readWindowInfo();

    const decision = request.manual
      ? manualDecision(query, request.manual)
      : this.analyzer.analyzeQuery(query, windowInfo, this.sources.screen?.isLive() ?? false);
    this.hooks.emit('decisionMade', { query, decision, timestamp: Date.now() });

    const screenText = decision.useOcr ? await this.readScreenText(windowInfo) : '';
    const webResults = decision.useWeb
      ? await this.searchWeb(query, decision)
      : this.similarCachedSearch(query, decision);

    const fused = this.fusion.fuseContexts(query, screenText, webResults, windowInfo);
    this.hooks.emit('contextFused', { query, fused, timestamp: Date.now() });

    const sessionId = this.memory.getSessionId(windowInfo);
    const messages = buildPromptMessages({
      systemPrompt: this.systemPrompt,
      query,
      fused,
      history: this.memory.getConversationHistory(sessionId),
      summary: this.memory.getContextSummary(sessionId),
    });

    this.memory.addMessage(sessionId, 'user', query, { queryType: decision.queryType });
    this.memory.anonymizeSessionData(sessionId);

    const durationMs = Date.now() - startedAt;
    this.hooks.emit('turnCompleted', { sessionId, durationMs, timestamp: Date.now() });
    this.logger.debug('Turn completed', {
      sessionId,
      queryType: decision.queryType,
      strategy: fused.fusionStrategy,
      durationMs,
    });

    return { sessionId, decision, windowInfo, screenText, webResults, fused, messages };
  }

  /**
   * Store the assistant's reply for the session's history
   */
  recordReply(sessionId: string, content: string): void {
    this.memory.addMessage(sessionId, 'assistant', content);
    this.memory.anonymizeSessionData(sessionId);
  }

  getHooks(): PipelineHooks {
    return this.hooks;
  }

  private async readWindowInfo(): Promise<string> {
    const source = this.sources.window;
    if (!source) {
      return '';
    }

    const info = await this.callSource('window', 'getActiveWindow', () => source.getActiveWindow());
    return formatWindowInfo(info);
  }

  private async readScreenText(windowInfo: string): Promise<string> {
    const source = this.sources.screen;
    if (!source) {
      this.skip('screen', 'No screen text source configured');
      return '';
    }

    const cached = this.optimizer.getCachedOcrResult(windowInfo);
    if (cached !== null) {
      return cached;
    }

    const text = (await this.callSource('screen', 'readText', () => source.readText())) ?? '';
    if (text.trim()) {
      this.optimizer.cacheOcrResult(windowInfo, text);
    }
    return text;
  }

  private async searchWeb(query: string, decision: ContextDecision): Promise<string> {
    const source = this.sources.web;
    if (!source) {
      this.skip('web', 'No web search source configured');
      return '';
    }

    const params = this.webParams(query, decision);
    const cached = this.optimizer.getCachedWebResult(query, params);
    if (cached !== null) {
      return cached;
    }

    const results = await this.callSource('web', 'search', () => source.search(query, params));
    const text = formatWebResults(results ?? []);
    if (text) {
      this.optimizer.cacheWebResult(query, text, params);
    }
    return text;
  }

  /**
   * Results of the cached search that stood in for a skipped one
   */
  private similarCachedSearch(query: string, decision: ContextDecision): string {
    if (decision.cachedWebQuery === undefined) {
      return '';
    }
    return this.optimizer.getSimilarCachedWebResult(query)?.results ?? '';
  }

  private webParams(query: string, decision: ContextDecision): WebSearchParams {
    const base = decision.webSearchParams ?? this.analyzer.getAdaptiveWebParams(query, decision.queryType);
    const params: WebSearchParams = {
      maxResults: base.maxResults ?? this.webDefaults.maxResults,
      safesearch: this.webDefaults.safesearch,
    };
    if (base.timelimit) {
      params.timelimit = base.timelimit;
    }
    return params;
  }

  /**
   * Call a collaborator through retry + its circuit; null on failure
   */
  private async callSource<T>(
    source: ContextSource,
    operation: string,
    fn: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await this.logger.time(
        `${source} ${operation}`,
        () => callCollaborator(source, operation, fn, this.breakers, {
          ...this.retryOptions,
          onRetry: (error, attempt, delayMs) =>
            this.logger.debug('Retrying collaborator call', { source, attempt, delayMs, error: error.message }),
        }),
        { source }
      );
    } catch (error) {
      const wrapped = wrapError(error, source, operation);
      this.logger.debug('Source treated as empty', { source, circuit: this.breakers.state(source) });
      this.hooks.emit('sourceFailed', { source, error: wrapped, timestamp: Date.now() });
      return null;
    }
  }

  private skip(source: ContextSource, reason: string): void {
    this.logger.debug('Source skipped', { source, reason });
    this.hooks.emit('sourceSkipped', { source, reason, timestamp: Date.now() });
  }
}

function manualDecision(query: string, manual: { useOcr: boolean; useWeb: boolean }): ContextDecision {
  return {
    useOcr: manual.useOcr,
    useWeb: manual.useWeb,
    queryType: classifyQuery(computeQuerySignals(query)).queryType,
    confidence: 1.0,
    reasoning: 'Manual source selection',
  };
}
