/**
 * Data Fusion
 *
 * Scores the screen, web and window sources for a query and merges the
 * relevant ones into a bounded primary/supporting bundle for the prompt.
 */

import {
  ContentType,
  RelevanceLevel,
  type ContextInfo,
  type ContextRelevance,
  type ContextSource,
  type FusedContext,
} from '../types.js';
import { RelevanceScorer } from '../relevance/relevance-scorer.js';
import { Logger, defaultLogger } from '../logger.js';
import { truncate } from '../utils.js';

export const NO_RELEVANT_CONTEXT = 'No relevant context available for this query.';
export const NO_RELEVANT_SOURCES_SUMMARY = 'Context analysis: No relevant sources found';

interface SourceFormat {
  contentType: ContentType;
  header: string;
  /** Character caps; null leaves the content whole */
  fullLimit: number | null;
  briefLimit: number | null;
}

const SOURCE_FORMATS: Record<ContextSource, SourceFormat> = {
  screen: { contentType: ContentType.OCR_TEXT, header: 'Screen Content (OCR):', fullLimit: 1500, briefLimit: 500 },
  web: { contentType: ContentType.WEB_RESULT, header: 'Web Search Results:', fullLimit: 2000, briefLimit: 600 },
  window: { contentType: ContentType.WINDOW_INFO, header: 'Active Window:', fullLimit: null, briefLimit: null },
};

const SOURCE_ORDER: readonly ContextSource[] = ['screen', 'web', 'window'];

interface ScoredSource {
  source: ContextSource;
  data: string;
  relevance: ContextRelevance;
}

export interface DataFusionOptions {
  scorer?: RelevanceScorer;
  logger?: Logger;
}

/**
 * Map a total relevance score onto its level
 */
export function relevanceLevel(score: number): RelevanceLevel {
  if (score >= 0.7) return RelevanceLevel.HIGH;
  if (score >= 0.4) return RelevanceLevel.MEDIUM;
  if (score >= 0.2) return RelevanceLevel.LOW;
  return RelevanceLevel.IRRELEVANT;
}

export class DataFusion {
  private scorer: RelevanceScorer;
  private logger: Logger;

  constructor(options: DataFusionOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child('fusion');
    this.scorer = options.scorer ?? new RelevanceScorer({ logger: options.logger });
  }

  /**
   * Relevance level, score and reasoning for one piece of content
   */
  analyzeRelevance(
    query: string,
    content: string,
    contentType: ContentType,
    contextInfo: ContextInfo = {}
  ): ContextRelevance {
    if (!content.trim()) {
      return {
        level: RelevanceLevel.IRRELEVANT,
        score: 0,
        reasoning: 'No context data available',
        keyMatches: [],
      };
    }

    const score = this.scorer.scoreContentRelevance(query, content, contentType, contextInfo);

    return {
      level: relevanceLevel(score.totalScore),
      score: score.totalScore,
      reasoning:
        `${score.explanation} (Total: ${score.totalScore.toFixed(2)}, ` +
        `Keywords: ${score.keywordScore.toFixed(2)}, ` +
        `Semantic: ${score.semanticScore.toFixed(2)}, ` +
        `Context: ${score.contextScore.toFixed(2)}, ` +
        `Confidence: ${score.confidence.toFixed(2)})`,
      keyMatches: this.scorer.findKeyMatches(query, content),
    };
  }

  /**
   * Fuse the three context sources into one bundle.
   * Same inputs always give the same result.
   */
  fuseContexts(
    query: string,
    screenText: string,
    webResults: string,
    windowInfo: string
  ): FusedContext {
    const contextInfo: ContextInfo = windowInfo.trim() ? { windowInfo } : {};
    const inputs: Record<ContextSource, string> = {
      screen: screenText,
      web: webResults,
      window: windowInfo,
    };

    // Array#sort is stable: ties keep screen, web, window order
    const scored: ScoredSource[] = SOURCE_ORDER
      .map(source => ({
        source,
        data: inputs[source],
        relevance: this.analyzeRelevance(query, inputs[source], SOURCE_FORMATS[source].contentType, contextInfo),
      }))
      .sort((a, b) => b.relevance.score - a.relevance.score);

    const fused = this.select(scored);

    this.logger.debug('Fused context', {
      strategy: fused.fusionStrategy,
      scores: Object.fromEntries(scored.map(s => [s.source, Number(s.relevance.score.toFixed(3))])),
    });

    return fused;
  }

  private select(scored: ScoredSource[]): FusedContext {
    const relevanceSummary = summarize(scored);
    const highs = scored.filter(s => s.relevance.level === RelevanceLevel.HIGH);
    const mediums = scored.filter(s => s.relevance.level === RelevanceLevel.MEDIUM);
    const top = scored[0];

    const [firstHigh, ...otherHighs] = highs;
    if (firstHigh) {
      const supporting = otherHighs.map(s => formatSource(s, false));
      const firstMedium = mediums[0];
      if (firstMedium) {
        supporting.push(formatSource(firstMedium, true));
      }
      return {
        primaryContext: formatSource(firstHigh, false),
        supportingContext: supporting.join('\n\n'),
        relevanceSummary,
        fusionStrategy:
          `Primary: ${firstHigh.source} (high relevance), ` +
          `Supporting: ${otherHighs.length + Math.min(1, mediums.length)} sources`,
      };
    }

    const [firstMedium, secondMedium] = mediums;
    if (firstMedium) {
      return {
        primaryContext: formatSource(firstMedium, false),
        supportingContext: secondMedium ? formatSource(secondMedium, true) : '',
        relevanceSummary,
        fusionStrategy:
          `Primary: ${firstMedium.source} (medium relevance), ` +
          `Supporting: ${secondMedium ? 1 : 0} sources`,
      };
    }

    if (top && top.relevance.level !== RelevanceLevel.IRRELEVANT) {
      return {
        primaryContext: formatSource(top, true),
        supportingContext: '',
        relevanceSummary,
        fusionStrategy: `Limited context: ${top.source} (low relevance)`,
      };
    }

    return {
      primaryContext: NO_RELEVANT_CONTEXT,
      supportingContext: '',
      relevanceSummary,
      fusionStrategy: 'No context fusion - insufficient relevance',
    };
  }
}

function formatSource(scored: ScoredSource, brief: boolean): string {
  const format = SOURCE_FORMATS[scored.source];
  const limit = brief ? format.briefLimit : format.fullLimit;
  const content = scored.data.trim();
  return `${format.header}\n${limit === null ? content : truncate(content, limit)}`;
}

function summarize(scored: ScoredSource[]): string {
  const counts = [RelevanceLevel.HIGH, RelevanceLevel.MEDIUM, RelevanceLevel.LOW]
    .map(level => ({ level, count: scored.filter(s => s.relevance.level === level).length }))
    .filter(({ count }) => count > 0)
    .map(({ level, count }) => `${count} ${level}-relevance`);

  if (counts.length === 0) {
    return NO_RELEVANT_SOURCES_SUMMARY;
  }
  return `Context analysis: ${counts.join(', ')} sources`;
}
