import { describe, it, expect, beforeEach } from 'vitest';
import { RelevanceScorer, EMPTY_INPUT_EXPLANATION } from '../src/relevance/relevance-scorer.js';
import { ContentType } from '../src/types.js';

describe('RelevanceScorer', () => {
  let scorer: RelevanceScorer;

  beforeEach(() => {
    scorer = new RelevanceScorer();
  });

  describe('empty input', () => {
    it('should return an all-zero score for empty content', () => {
      const score = scorer.scoreContentRelevance('save the file', '', ContentType.OCR_TEXT);

      expect(score).toEqual({
        totalScore: 0,
        keywordScore: 0,
        semanticScore: 0,
        contextScore: 0,
        freshnessScore: 0,
        confidence: 0,
        explanation: EMPTY_INPUT_EXPLANATION,
      });
    });

    it('should return an all-zero score for a blank query', () => {
      const score = scorer.scoreContentRelevance('   ', 'File menu', ContentType.WEB_RESULT);

      expect(score.totalScore).toBe(0);
      expect(score.confidence).toBe(0);
      expect(score.explanation).toBe('Empty content or query');
    });
  });

  describe('sub-scores', () => {
    it('should combine keyword and semantic scores with the window-info weights', () => {
      const score = scorer.scoreContentRelevance(
        'save file',
        'Click Save to store the file',
        ContentType.WINDOW_INFO
      );

      expect(score.keywordScore).toBeCloseTo(1.0);
      // two literal phrase hits plus one related concept ("save" -> "file")
      expect(score.semanticScore).toBeCloseTo(0.5);
      expect(score.contextScore).toBe(0);
      expect(score.freshnessScore).toBe(0.5);
      expect(score.totalScore).toBeCloseTo(0.6);
      expect(score.confidence).toBeCloseTo(0.9);
      expect(score.explanation).toBe('Relevant due to: strong keyword matches, semantic relevance');
    });

    it('should boost OCR content for UI words and screen deictics with window context', () => {
      const score = scorer.scoreContentRelevance(
        'what does this button do',
        'Submit button - sends the form',
        ContentType.OCR_TEXT,
        { windowInfo: 'Active window: Checkout - Browser (process: chrome.exe)' }
      );

      expect(score.keywordScore).toBeCloseTo(1 / 3 + 0.3);
      expect(score.semanticScore).toBeCloseTo(0.2);
      expect(score.contextScore).toBeCloseTo(0.4);
      expect(score.freshnessScore).toBe(1.0);
      expect(score.totalScore).toBeCloseTo(0.51333, 4);
      expect(score.confidence).toBeCloseTo((1 / 3 + 0.3 + 0.2 + 0.4) / 3 + 0.2);
      expect(score.explanation).toBe(
        'Relevant due to: strong keyword matches, contextual relevance, current information'
      );
    });

    it('should give no context score without window info', () => {
      const score = scorer.scoreContentRelevance(
        'what does this button do',
        'Submit button - sends the form',
        ContentType.OCR_TEXT
      );

      expect(score.contextScore).toBe(0);
      expect(score.totalScore).toBeCloseTo(0.39333, 4);
    });

    it('should score application names found in query and content', () => {
      const score = scorer.scoreContentRelevance(
        'click the submit button',
        'Submit button',
        ContentType.OCR_TEXT,
        { windowInfo: 'Active window: Submit Form (process: app)' }
      );

      expect(score.contextScore).toBeCloseTo(0.5);
      expect(score.totalScore).toBeCloseTo(0.71667, 4);
    });

    it('should use a fixed freshness per content type', () => {
      const ocr = scorer.scoreContentRelevance('zebra', 'giraffe', ContentType.OCR_TEXT);
      const web = scorer.scoreContentRelevance('zebra', 'giraffe', ContentType.WEB_RESULT);
      const window = scorer.scoreContentRelevance('zebra', 'giraffe', ContentType.WINDOW_INFO);

      expect(ocr.freshnessScore).toBe(1.0);
      expect(web.freshnessScore).toBe(0.8);
      expect(window.freshnessScore).toBe(0.5);
    });
  });

  describe('confidence', () => {
    it('should scale a single signal by 0.7', () => {
      const score = scorer.scoreContentRelevance('cats?', 'cats sleep', ContentType.WINDOW_INFO);

      expect(score.keywordScore).toBe(1);
      expect(score.semanticScore).toBe(0);
      expect(score.confidence).toBeCloseTo(0.7);
      expect(score.explanation).toBe('Relevant due to: strong keyword matches');
    });

    it('should fall back to 0.3 without any signal', () => {
      const score = scorer.scoreContentRelevance('zebra', 'giraffe', ContentType.WINDOW_INFO);

      expect(score.confidence).toBe(0.3);
      expect(score.totalScore).toBeCloseTo(0.05);
      expect(score.explanation).toBe('Low relevance for window_info');
    });

    it('should mention current information for fresh content without matches', () => {
      const score = scorer.scoreContentRelevance('zebra', 'giraffe', ContentType.WEB_RESULT);

      expect(score.explanation).toBe('Relevant due to: current information');
    });
  });

  describe('bounds', () => {
    it('should keep total score and confidence within [0, 1]', () => {
      const cases: Array<[string, string, ContentType]> = [
        ['click the submit button on this screen', 'Submit button submit click screen this', ContentType.OCR_TEXT],
        ['latest news today', 'latest news today breaking news', ContentType.WEB_RESULT],
        ['typescript programming code', 'typescript programming code script language software', ContentType.WEB_RESULT],
        ['x', 'y', ContentType.WINDOW_INFO],
      ];

      for (const [query, content, type] of cases) {
        const score = scorer.scoreContentRelevance(query, content, type, {
          windowInfo: 'Active window: Editor - Code (process: code.exe)',
        });
        expect(score.totalScore).toBeGreaterThanOrEqual(0);
        expect(score.totalScore).toBeLessThanOrEqual(1);
        expect(score.confidence).toBeGreaterThanOrEqual(0);
        expect(score.confidence).toBeLessThanOrEqual(1);
      }
    });
  });

  describe('findKeyMatches', () => {
    it('should return sorted query words present in the content', () => {
      expect(scorer.findKeyMatches('How do I save the file', 'File saved to disk')).toEqual(['file']);
      expect(scorer.findKeyMatches('save file', 'Click Save to store the file')).toEqual(['file', 'save']);
    });

    it('should ignore stop words', () => {
      expect(scorer.findKeyMatches('the and of', 'the and of')).toEqual([]);
    });
  });
});
