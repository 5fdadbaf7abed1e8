/**
 * Smart Context Analyzer
 *
 * Classifies a query and decides which external context to fetch for it.
 * The decision's reasoning traces every step that shaped it, including
 * any performance gate that vetoed a source and any override applied.
 */

import {
  QueryType,
  type ContextDecision,
  type GateResult,
  type WebSearchParams,
} from '../types.js';
import { PerformanceOptimizer } from '../performance/performance-optimizer.js';
import { ANALYZER_VOCABULARY as VOCAB, matchTerms } from '../vocabulary.js';
import { Logger, defaultLogger } from '../logger.js';
import { extractWords } from '../utils.js';

/**
 * Keyword scores (matched terms per query word, capped at 1) and pattern flags
 */
export interface QuerySignals {
  screen: number;
  web: number;
  time: number;
  technical: number;
  conversational: number;
  hasQuestionWords: boolean;
  hasDemonstratives: boolean;
  hasCurrentReference: boolean;
}

export interface QueryClassification {
  queryType: QueryType;
  confidence: number;
}

export interface SmartContextAnalyzerOptions {
  optimizer?: PerformanceOptimizer;
  logger?: Logger;
}

/**
 * Score a query against each keyword family
 */
export function computeQuerySignals(query: string): QuerySignals {
  const queryLower = query.toLowerCase();
  const tokens = extractWords(queryLower);
  const words = new Set(tokens);

  const score = (terms: ReadonlySet<string>): number =>
    tokens.length === 0 ? 0 : Math.min(1, matchTerms(queryLower, words, terms).length / tokens.length);
  const has = (terms: ReadonlySet<string>): boolean =>
    matchTerms(queryLower, words, terms).length > 0;

  return {
    screen: score(VOCAB.screenKeywords),
    web: score(VOCAB.webKeywords),
    time: score(VOCAB.timeIndicators),
    technical: score(VOCAB.technicalKeywords),
    conversational: score(VOCAB.conversationalKeywords),
    hasQuestionWords: has(VOCAB.questionWords),
    hasDemonstratives: has(VOCAB.demonstratives),
    hasCurrentReference: has(VOCAB.currentReferences),
  };
}

/**
 * Ordered rule cascade; the first matching rule wins
 */
export function classifyQuery(signals: QuerySignals): QueryClassification {
  const { screen, web, time, technical, conversational } = signals;

  if (conversational > 0.3) {
    return { queryType: QueryType.CONVERSATIONAL, confidence: 0.9 };
  }

  if (screen > 0.1 || (signals.hasDemonstratives && signals.hasCurrentReference)) {
    return { queryType: QueryType.SCREEN_RELATED, confidence: Math.min(0.9, 0.5 + screen * 2) };
  }

  if (time > 0.1 && web > 0.05) {
    return { queryType: QueryType.CURRENT_EVENTS, confidence: Math.min(0.9, 0.6 + time + web) };
  }

  if (technical > 0.1) {
    return { queryType: QueryType.TECHNICAL_INFO, confidence: Math.min(0.8, 0.5 + technical * 1.5) };
  }

  if (web > 0.05 || time > 0.05) {
    return { queryType: QueryType.WEB_SEARCH_NEEDED, confidence: Math.min(0.8, 0.4 + (web + time) * 2) };
  }

  // Shadowed by the web rule above with the shipped thresholds
  if (screen > 0.05 && web > 0.05) {
    return { queryType: QueryType.MIXED_CONTEXT, confidence: 0.7 };
  }

  return { queryType: QueryType.GENERAL_QUESTION, confidence: 0.5 };
}

export class SmartContextAnalyzer {
  private optimizer: PerformanceOptimizer;
  private logger: Logger;

  constructor(options: SmartContextAnalyzerOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child('analyzer');
    this.optimizer = options.optimizer ?? new PerformanceOptimizer({ logger: options.logger });
  }

  /**
   * Decide whether OCR and/or web search should run for a query.
   * Consults each optimizer gate once.
   */
  analyzeQuery(query: string, windowInfo: string = '', hasLiveOcr: boolean = false): ContextDecision {
    if (!query.trim()) {
      return {
        useOcr: false,
        useWeb: false,
        queryType: QueryType.CONVERSATIONAL,
        confidence: 0,
        reasoning: 'Empty query',
      };
    }

    const ocrGate = this.optimizer.shouldUseOcr(query, windowInfo);
    const webGate = this.optimizer.shouldUseWebSearch(query);

    if (!ocrGate.allowed && !webGate.allowed) {
      const decision: ContextDecision = {
        useOcr: false,
        useWeb: false,
        queryType: QueryType.GENERAL_QUESTION,
        confidence: 0.8,
        reasoning: `Performance optimization: ${ocrGate.reason}; ${webGate.reason}`,
      };
      if (webGate.cachedQuery !== undefined) {
        decision.cachedWebQuery = webGate.cachedQuery;
      }
      this.logger.debug('Context decision', { queryType: decision.queryType, reasoning: decision.reasoning });
      return decision;
    }

    const signals = computeQuerySignals(query);
    const { queryType, confidence } = classifyQuery(signals);
    const decision = this.makeDecision(query, queryType, confidence, signals, hasLiveOcr, ocrGate, webGate);

    this.logger.debug('Context decision', {
      queryType,
      useOcr: decision.useOcr,
      useWeb: decision.useWeb,
      signals,
      reasoning: decision.reasoning,
    });

    return decision;
  }

  /**
   * Web parameters for a query type, used when a decision carries none
   */
  getAdaptiveWebParams(query: string, queryType: QueryType): WebSearchParams {
    const params: WebSearchParams = { maxResults: 5, safesearch: 'moderate' };
    const queryLower = query.toLowerCase();

    if (queryType === QueryType.CURRENT_EVENTS) {
      params.timelimit = 'd';
      params.maxResults = 5;
    } else if (queryType === QueryType.TECHNICAL_INFO) {
      params.maxResults = 3;
      params.timelimit = 'y';
    } else if (queryLower.includes('tutorial') || queryLower.includes('how to')) {
      params.maxResults = 3;
    } else if (queryLower.includes('news')) {
      params.timelimit = 'w';
      params.maxResults = 5;
    }

    return params;
  }

  private makeDecision(
    query: string,
    queryType: QueryType,
    confidence: number,
    signals: QuerySignals,
    hasLiveOcr: boolean,
    ocrGate: GateResult,
    webGate: GateResult
  ): ContextDecision {
    let useOcr = false;
    let useWeb = false;
    let wantsWeb = false;
    let reasoning = '';
    let webSearchParams: WebSearchParams | undefined;

    const tunedParams = (base: WebSearchParams): WebSearchParams =>
      this.optimizer.optimizeWebSearchParams(query, base);

    switch (queryType) {
      case QueryType.CONVERSATIONAL:
        reasoning = 'Conversational query - no external context needed';
        break;

      case QueryType.SCREEN_RELATED:
        useOcr = ocrGate.allowed;
        reasoning = useOcr
          ? 'Screen-related query detected - using OCR to analyze current display'
          : `Screen-related query but OCR skipped: ${ocrGate.reason}`;
        break;

      case QueryType.CURRENT_EVENTS:
        wantsWeb = true;
        useWeb = webGate.allowed;
        if (useWeb) {
          reasoning = 'Current events query - using web search for latest information';
          webSearchParams = tunedParams({ timelimit: 'd', maxResults: 5 });
        } else {
          reasoning = `Current events query but web search skipped: ${webGate.reason}`;
        }
        break;

      case QueryType.TECHNICAL_INFO:
        wantsWeb = true;
        useWeb = webGate.allowed;
        if (useWeb) {
          reasoning = 'Technical query - using web search for documentation and tutorials';
          webSearchParams = tunedParams({ maxResults: 3 });
        } else {
          reasoning = `Technical query but web search skipped: ${webGate.reason}`;
        }
        break;

      case QueryType.WEB_SEARCH_NEEDED:
        wantsWeb = true;
        useWeb = webGate.allowed;
        if (useWeb) {
          reasoning = 'Query requires external information - using web search';
          webSearchParams = tunedParams({ maxResults: 5 });
        } else {
          reasoning = `Query requires external info but web search skipped: ${webGate.reason}`;
        }
        break;

      case QueryType.MIXED_CONTEXT:
        wantsWeb = true;
        useOcr = ocrGate.allowed;
        useWeb = webGate.allowed;
        if (useOcr && useWeb) {
          reasoning = 'Mixed context query - using both screen OCR and web search';
          webSearchParams = tunedParams({ maxResults: 3 });
        } else if (useOcr) {
          reasoning = `Mixed context query - using OCR only (web skipped: ${webGate.reason})`;
        } else if (useWeb) {
          reasoning = `Mixed context query - using web only (OCR skipped: ${ocrGate.reason})`;
          webSearchParams = tunedParams({ maxResults: 5 });
        } else {
          reasoning = `Mixed context query - using AI only (OCR: ${ocrGate.reason}, Web: ${webGate.reason})`;
        }
        break;

      case QueryType.GENERAL_QUESTION:
        if (hasLiveOcr && signals.screen > 0.02 && ocrGate.allowed) {
          useOcr = true;
          reasoning = 'General query with live OCR available - including screen context';
        } else {
          wantsWeb = signals.web > 0.02 || signals.time > 0.02;
          useWeb = wantsWeb && webGate.allowed;
          if (useWeb) {
            reasoning = 'General query - using web search for comprehensive information';
            webSearchParams = tunedParams({ maxResults: 3 });
          } else {
            reasoning = 'General query - using AI knowledge only';
          }
        }
        break;
    }

    const queryLower = query.toLowerCase();
    const words = new Set(extractWords(queryLower));

    if (matchTerms(queryLower, words, VOCAB.screenOverridePhrases).length > 0) {
      if (ocrGate.allowed) {
        useOcr = true;
        reasoning += ' (Override: demonstrative reference detected)';
      } else {
        reasoning += ` (Demonstrative override blocked: ${ocrGate.reason})`;
      }
    }

    if (matchTerms(queryLower, words, VOCAB.timeOverrideWords).length > 0) {
      wantsWeb = true;
      if (webGate.allowed) {
        useWeb = true;
        if (!webSearchParams) {
          webSearchParams = { timelimit: 'd' };
        }
        reasoning += ' (Override: time-sensitive information needed)';
      } else if (!useWeb) {
        reasoning += ` (Time-sensitive override blocked: ${webGate.reason})`;
      }
    }

    const decision: ContextDecision = { useOcr, useWeb, queryType, confidence, reasoning };
    if (webSearchParams) {
      decision.webSearchParams = webSearchParams;
    }
    if (wantsWeb && !useWeb && webGate.cachedQuery !== undefined) {
      decision.cachedWebQuery = webGate.cachedQuery;
    }
    return decision;
  }
}
