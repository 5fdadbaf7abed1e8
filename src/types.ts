/**
 * Kind of content being scored. Drives the weight table and freshness baseline.
 */
export enum ContentType {
  OCR_TEXT = 'ocr_text',
  WEB_RESULT = 'web_result',
  WINDOW_INFO = 'window_info',
}

/**
 * Relevance of one piece of content to a query, with its breakdown.
 * All scores are in [0, 1].
 */
export interface RelevanceScore {
  totalScore: number;
  keywordScore: number;
  semanticScore: number;
  contextScore: number;
  freshnessScore: number;
  confidence: number;
  explanation: string;
}

/**
 * Extra context available while scoring
 */
export interface ContextInfo {
  /** Formatted active-window line, e.g. "Active window: Editor (process: code)" */
  windowInfo?: string;
}

/**
 * Coarse bucket derived from a total relevance score
 */
export enum RelevanceLevel {
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
  IRRELEVANT = 'irrelevant',
}

export interface ContextRelevance {
  level: RelevanceLevel;
  score: number;
  reasoning: string;
  /** Query words found verbatim in the content */
  keyMatches: string[];
}

/**
 * Context sources the fusion step can draw from
 */
export type ContextSource = 'screen' | 'web' | 'window';

/**
 * Result of fusing the context sources for one chat turn
 */
export interface FusedContext {
  readonly primaryContext: string;
  readonly supportingContext: string;
  readonly relevanceSummary: string;
  readonly fusionStrategy: string;
}

export enum QueryType {
  SCREEN_RELATED = 'screen_related',
  WEB_SEARCH_NEEDED = 'web_search_needed',
  CURRENT_EVENTS = 'current_events',
  TECHNICAL_INFO = 'technical_info',
  GENERAL_QUESTION = 'general_question',
  MIXED_CONTEXT = 'mixed_context',
  CONVERSATIONAL = 'conversational',
}

/** d = day, w = week, m = month, y = year */
export type TimeLimit = 'd' | 'w' | 'm' | 'y';

export type SafeSearch = 'strict' | 'moderate' | 'off';

export interface WebSearchParams {
  maxResults?: number;
  timelimit?: TimeLimit;
  safesearch?: SafeSearch;
}

/**
 * Which external context fetches should happen for a query, and why
 */
export interface ContextDecision {
  useOcr: boolean;
  useWeb: boolean;
  queryType: QueryType;
  confidence: number;
  reasoning: string;
  webSearchParams?: WebSearchParams;

  /** Web search was skipped because this cached query is similar enough to serve instead */
  cachedWebQuery?: string;
}

/**
 * Outcome of a performance gate check
 */
export interface GateResult {
  allowed: boolean;
  reason: string;

  /** Set when a similar cached web search caused the denial */
  cachedQuery?: string;
}

/**
 * Message roles compatible with OpenAI-style chat APIs
 */
export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * A message stored in conversation memory
 */
export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp: number;
  metadata: Record<string, unknown>;
}

/**
 * A message in the shape chat-completion APIs take
 */
export interface LLMMessage {
  role: MessageRole;
  content: string;
}

/**
 * Active window as reported by the host
 */
export interface WindowInfo {
  title: string;
  processName?: string;
}

export interface WebSearchResult {
  title: string;
  href: string;
  body: string;
}

/**
 * Screen capture + OCR, implemented by the host
 */
export interface ScreenTextSource {
  /** Whether continuous capture is running */
  isLive(): boolean;
  /** Recent OCR text (live transcript or a fresh single capture) */
  readText(): Promise<string>;
}

/**
 * Web search backend, implemented by the host
 */
export interface WebSearchSource {
  search(query: string, params: WebSearchParams): Promise<WebSearchResult[]>;
}

/**
 * Active-window detection, implemented by the host
 */
export interface WindowInfoSource {
  getActiveWindow(): Promise<WindowInfo | null>;
}
