// Main export
export {
  ContextPipeline,
  type ContextPipelineOptions,
  type PipelineSources,
  type TurnRequest,
  type TurnResult,
  type WebSearchDefaults,
} from './context-pipeline.js';

// Components
export {
  RelevanceScorer,
  CONTENT_TYPE_WEIGHTS,
  EMPTY_INPUT_EXPLANATION,
  type RelevanceScorerOptions,
  type ScoreWeights,
} from './relevance/relevance-scorer.js';
export {
  DataFusion,
  relevanceLevel,
  NO_RELEVANT_CONTEXT,
  NO_RELEVANT_SOURCES_SUMMARY,
  type DataFusionOptions,
} from './fusion/data-fusion.js';
export {
  SmartContextAnalyzer,
  computeQuerySignals,
  classifyQuery,
  type QuerySignals,
  type QueryClassification,
  type SmartContextAnalyzerOptions,
} from './analysis/smart-context-analyzer.js';
export {
  PerformanceOptimizer,
  CacheKind,
  CACHE_TTL_SECONDS,
  type CachedPayload,
  type CachedWebSearch,
  type CacheStats,
  type PerformanceMetrics,
  type PerformanceOptimizerOptions,
} from './performance/performance-optimizer.js';
export { TtlCache, type CacheEntry, type TtlCacheOptions } from './performance/ttl-cache.js';
export { SlidingWindowRateLimiter } from './performance/rate-limiter.js';
export {
  ConversationMemory,
  type ConversationMemoryOptions,
  type HistoryOptions,
  type MemoryStats,
} from './memory/conversation-memory.js';
export { buildPromptMessages, type PromptInput } from './prompt/prompt-builder.js';

// Types
export {
  ContentType,
  RelevanceLevel,
  QueryType,
} from './types.js';
export type {
  RelevanceScore,
  ContextInfo,
  ContextRelevance,
  ContextSource,
  FusedContext,
  ContextDecision,
  GateResult,
  WebSearchParams,
  TimeLimit,
  SafeSearch,
  MessageRole,
  ConversationMessage,
  LLMMessage,
  WindowInfo,
  WebSearchResult,
  ScreenTextSource,
  WebSearchSource,
  WindowInfoSource,
} from './types.js';

// Collaborator text formats
export { formatWindowInfo, parseWindowInfo, formatWebResults, applicationTerms } from './sources.js';

// Configuration
export {
  loadConfig,
  DEFAULT_SYSTEM_PROMPT,
  type AssistantConfig,
  type LoadConfigOptions,
} from './config.js';

// Hooks & Metrics
export {
  PipelineHooks,
  createMetricsReporter,
  type PipelineEventType,
  type PipelineEventMap,
  type PipelineMetrics,
  type EventListener,
  type AnyEventListener,
} from './hooks.js';

// Collaborator call guard
export {
  retry,
  callCollaborator,
  isTransientError,
  backoffDelay,
  SourceCircuitBreakers,
  CircuitState,
  type RetryOptions,
  type CircuitBreakerOptions,
} from './retry.js';

// Errors
export {
  ContextFusionError,
  ConfigurationError,
  CollaboratorError,
  CircuitOpenError,
  isContextFusionError,
  wrapError,
} from './errors.js';

// Logging
export {
  Logger,
  LogLevel,
  createLogger,
  parseLogLevel,
  prettyFormat,
  jsonFormat,
  defaultLogger,
  type LogEntry,
  type LoggerOptions,
  type LogLevelName,
  type LogFormatName,
} from './logger.js';

// Utilities
export { hashContent, jaccardSimilarity, extractWords, truncate } from './utils.js';
