import vocabulary from './data/vocabulary.json' with { type: 'json' };

/**
 * Keyword tables used by the scorer, the analyzer and the optimizer.
 * Entries with a space are phrases and match as substrings; single words
 * match whole words only (see `matchTerms`).
 */

const toSet = (entries: readonly string[]): ReadonlySet<string> => new Set(entries);

export const RELEVANCE_VOCABULARY = {
  stopWords: toSet(vocabulary.relevance.stopWords),
  actionKeywords: toSet(vocabulary.relevance.actionKeywords),
  uiElements: toSet(vocabulary.relevance.uiElements),
  screenReferences: toSet(vocabulary.relevance.screenReferences),
  informationKeywords: toSet(vocabulary.relevance.informationKeywords),
  timeSensitive: toSet(vocabulary.relevance.timeSensitive),
  screenDeictics: toSet(vocabulary.relevance.screenDeictics),
  informationIndicators: toSet(vocabulary.relevance.informationIndicators),
  relatedConcepts: new Map<string, readonly string[]>(Object.entries(vocabulary.relevance.relatedConcepts)),
} as const;

export const ANALYZER_VOCABULARY = {
  screenKeywords: toSet(vocabulary.analyzer.screenKeywords),
  webKeywords: toSet(vocabulary.analyzer.webKeywords),
  timeIndicators: toSet(vocabulary.analyzer.timeIndicators),
  technicalKeywords: toSet(vocabulary.analyzer.technicalKeywords),
  conversationalKeywords: toSet(vocabulary.analyzer.conversationalKeywords),
  questionWords: toSet(vocabulary.analyzer.questionWords),
  demonstratives: toSet(vocabulary.analyzer.demonstratives),
  currentReferences: toSet(vocabulary.analyzer.currentReferences),
  screenOverridePhrases: toSet(vocabulary.analyzer.screenOverridePhrases),
  timeOverrideWords: toSet(vocabulary.analyzer.timeOverrideWords),
} as const;

export const OPTIMIZER_VOCABULARY = {
  genericPatterns: toSet(vocabulary.optimizer.genericPatterns),
  genericScreenIndicators: toSet(vocabulary.optimizer.genericScreenIndicators),
  screenContextIndicators: toSet(vocabulary.optimizer.screenContextIndicators),
  webIndicators: toSet(vocabulary.optimizer.webIndicators),
  localScreenPhrases: toSet(vocabulary.optimizer.localScreenPhrases),
  questionWords: toSet(vocabulary.optimizer.questionWords),
} as const;

/**
 * Terms from `terms` present in the text: phrases by substring of the
 * lowercased text, single words by membership in its word set.
 */
export function matchTerms(
  lowerText: string,
  words: ReadonlySet<string>,
  terms: ReadonlySet<string>
): string[] {
  const matched: string[] = [];
  for (const term of terms) {
    const found = term.includes(' ') ? lowerText.includes(term) : words.has(term);
    if (found) matched.push(term);
  }
  return matched;
}
