/**
 * Relevance Scorer
 *
 * Lexical relevance of OCR text, web results and window info to a query:
 * - keyword overlap with category boosts per content type
 * - literal phrase hits plus a small related-concept table
 * - active-window context
 * - a freshness baseline per content type
 *
 * No embeddings, no I/O. Every input yields a score, never an exception.
 */

import { ContentType, type ContextInfo, type RelevanceScore } from '../types.js';
import { applicationTerms } from '../sources.js';
import { RELEVANCE_VOCABULARY as VOCAB } from '../vocabulary.js';
import { Logger, defaultLogger } from '../logger.js';
import { wordSet } from '../utils.js';

export interface ScoreWeights {
  keyword: number;
  semantic: number;
  context: number;
  freshness: number;
}

export const CONTENT_TYPE_WEIGHTS: Record<ContentType, ScoreWeights> = {
  [ContentType.OCR_TEXT]: { keyword: 0.4, semantic: 0.2, context: 0.3, freshness: 0.1 },
  [ContentType.WEB_RESULT]: { keyword: 0.3, semantic: 0.3, context: 0.2, freshness: 0.2 },
  [ContentType.WINDOW_INFO]: { keyword: 0.4, semantic: 0.3, context: 0.2, freshness: 0.1 },
};

const FRESHNESS: Record<ContentType, number> = {
  [ContentType.OCR_TEXT]: 1.0,
  [ContentType.WEB_RESULT]: 0.8,
  [ContentType.WINDOW_INFO]: 0.5,
};

/** Sub-scores at or below this do not count as signal for confidence */
const SIGNAL_FLOOR = 0.1;

export const EMPTY_INPUT_EXPLANATION = 'Empty content or query';

export interface RelevanceScorerOptions {
  logger?: Logger;
}

export class RelevanceScorer {
  private logger: Logger;

  constructor(options: RelevanceScorerOptions = {}) {
    this.logger = (options.logger ?? defaultLogger).child('relevance');
  }

  /**
   * Score how relevant `content` is to `query`.
   * Blank query or content yields an all-zero score.
   */
  scoreContentRelevance(
    query: string,
    content: string,
    contentType: ContentType,
    contextInfo: ContextInfo = {}
  ): RelevanceScore {
    if (!query.trim() || !content.trim()) {
      return {
        totalScore: 0,
        keywordScore: 0,
        semanticScore: 0,
        contextScore: 0,
        freshnessScore: 0,
        confidence: 0,
        explanation: EMPTY_INPUT_EXPLANATION,
      };
    }

    const queryLower = query.toLowerCase();
    const contentLower = content.toLowerCase();
    const queryWords = wordSet(queryLower, VOCAB.stopWords);
    const contentWords = wordSet(contentLower, VOCAB.stopWords);

    const keywordScore = this.keywordRelevance(queryWords, contentWords, contentType);
    const semanticScore = this.semanticRelevance(queryLower, contentLower);
    const contextScore = this.contextRelevance(queryLower, contentLower, contentType, contextInfo);
    const freshnessScore = FRESHNESS[contentType];

    const weights = CONTENT_TYPE_WEIGHTS[contentType];
    const weighted =
      keywordScore * weights.keyword +
      semanticScore * weights.semantic +
      contextScore * weights.context +
      freshnessScore * weights.freshness;

    const score: RelevanceScore = {
      totalScore: Math.min(weighted, 1.0),
      keywordScore,
      semanticScore,
      contextScore,
      freshnessScore,
      confidence: this.confidence(keywordScore, semanticScore, contextScore),
      explanation: this.explain(keywordScore, semanticScore, contextScore, freshnessScore, contentType),
    };

    this.logger.debug('Scored content', {
      contentType,
      total: Number(score.totalScore.toFixed(3)),
    });

    return score;
  }

  /**
   * Query words (stop words removed) that appear verbatim in the content, sorted
   */
  findKeyMatches(query: string, content: string): string[] {
    const contentWords = wordSet(content, VOCAB.stopWords);
    return [...wordSet(query, VOCAB.stopWords)]
      .filter(word => contentWords.has(word))
      .sort();
  }

  private keywordRelevance(
    queryWords: Set<string>,
    contentWords: Set<string>,
    contentType: ContentType
  ): number {
    if (queryWords.size === 0) {
      return 0;
    }

    let direct = 0;
    for (const word of queryWords) {
      if (contentWords.has(word)) direct++;
    }
    const matchRatio = direct / queryWords.size;

    let categoryBoost = 0;
    if (contentType === ContentType.OCR_TEXT) {
      if (intersects(queryWords, VOCAB.uiElements) ||
          intersects(queryWords, VOCAB.actionKeywords) ||
          intersects(queryWords, VOCAB.screenReferences)) {
        categoryBoost = 0.3;
      }
    } else if (contentType === ContentType.WEB_RESULT) {
      if (intersects(queryWords, VOCAB.informationKeywords) ||
          intersects(queryWords, VOCAB.timeSensitive)) {
        categoryBoost = 0.2;
      }
    }

    // Variations and typos: substring overlap with a different word
    let partial = 0;
    for (const queryWord of queryWords) {
      if (queryWord.length <= 3) continue;
      for (const contentWord of contentWords) {
        if (contentWord.length > 3 && contentWord !== queryWord &&
            (contentWord.includes(queryWord) || queryWord.includes(contentWord))) {
          partial += 0.1;
        }
      }
    }
    partial = Math.min(partial, 0.3);

    return Math.min(matchRatio + categoryBoost + partial, 1.0);
  }

  private semanticRelevance(queryLower: string, contentLower: string): number {
    const phrases = new Set(
      queryLower.split(/\s+/).map(p => p.trim()).filter(p => p.length > 2)
    );

    let phraseScore = 0;
    for (const phrase of phrases) {
      if (contentLower.includes(phrase)) phraseScore += 0.2;
    }
    phraseScore = Math.min(phraseScore, 0.6);

    const queryWords = wordSet(queryLower);
    let conceptScore = 0;
    for (const [concept, related] of VOCAB.relatedConcepts) {
      if (!queryWords.has(concept)) continue;
      for (const word of related) {
        if (contentLower.includes(word)) conceptScore += 0.1;
      }
    }
    conceptScore = Math.min(conceptScore, 0.4);

    return phraseScore + conceptScore;
  }

  private contextRelevance(
    queryLower: string,
    contentLower: string,
    contentType: ContentType,
    contextInfo: ContextInfo
  ): number {
    const windowInfo = contextInfo.windowInfo?.trim();
    if (!windowInfo) {
      return 0;
    }

    const queryWords = wordSet(queryLower);
    let score = 0;

    const appTerms = applicationTerms(windowInfo);
    if (appTerms.size > 0) {
      if (intersects(queryWords, appTerms)) {
        score += 0.3;
      }
      if (intersects(wordSet(contentLower), appTerms)) {
        score += 0.2;
      }
    }

    if (contentType === ContentType.OCR_TEXT && intersects(queryWords, VOCAB.screenDeictics)) {
      score += 0.4;
    } else if (contentType === ContentType.WEB_RESULT && intersects(queryWords, VOCAB.informationIndicators)) {
      score += 0.3;
    }

    return Math.min(score, 1.0);
  }

  private confidence(keyword: number, semantic: number, context: number): number {
    const signals = [keyword, semantic, context].filter(s => s > SIGNAL_FLOOR);

    if (signals.length >= 2) {
      const mean = signals.reduce((sum, s) => sum + s, 0) / signals.length;
      return Math.min(0.9, mean + 0.2);
    }
    if (signals.length === 1) {
      return (signals[0] ?? 0) * 0.7;
    }
    return 0.3;
  }

  private explain(
    keyword: number,
    semantic: number,
    context: number,
    freshness: number,
    contentType: ContentType
  ): string {
    const reasons: string[] = [];

    if (keyword > 0.5) {
      reasons.push('strong keyword matches');
    } else if (keyword > 0.2) {
      reasons.push('some keyword matches');
    }
    if (semantic > 0.3) reasons.push('semantic relevance');
    if (context > 0.3) reasons.push('contextual relevance');
    if (freshness > 0.7) reasons.push('current information');

    if (reasons.length === 0) {
      return `Low relevance for ${contentType}`;
    }
    return `Relevant due to: ${reasons.join(', ')}`;
  }
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  for (const item of a) {
    if (b.has(item)) return true;
  }
  return false;
}
