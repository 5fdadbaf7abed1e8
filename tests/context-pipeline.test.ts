import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ContextPipeline, type PipelineSources } from '../src/context-pipeline.js';
import { ConversationMemory } from '../src/memory/conversation-memory.js';
import { PipelineHooks, type SourceFailedPayload, type SourceSkippedPayload } from '../src/hooks.js';
import { loadConfig } from '../src/config.js';
import { CollaboratorError } from '../src/errors.js';
import { Logger, LogLevel } from '../src/logger.js';
import { QueryType, type WebSearchResult, type WindowInfo } from '../src/types.js';

const silent = new Logger({ level: LogLevel.SILENT });

const TRACEBACK = [
  'Traceback (most recent call last):',
  '  File "report.py", line 12, in <module>',
  '    total = price + quantity',
  "TypeError: unsupported operand type(s) for +: 'int' and 'str'",
].join('\n');

const SCREEN_QUERY = "What's this error message on my screen?";
const NEWS_QUERY = 'What are the latest developments in AI today?';
const TERMINAL_WINDOW = 'Active window: Terminal (process: bash)';

const NEWS_RESULTS: WebSearchResult[] = [
  { title: 'AI roundup', href: 'https://example.com/ai', body: 'New models were announced today.' },
];

function fakeSources(window: WindowInfo | null = { title: 'Terminal', processName: 'bash' }) {
  return {
    screen: {
      isLive: () => false,
      readText: vi.fn<[], Promise<string>>().mockResolvedValue(TRACEBACK),
    },
    web: {
      search: vi.fn<[string, object], Promise<WebSearchResult[]>>().mockResolvedValue(NEWS_RESULTS),
    },
    window: {
      getActiveWindow: vi.fn<[], Promise<WindowInfo | null>>().mockResolvedValue(window),
    },
  };
}

describe('ContextPipeline', () => {
  let hooks: PipelineHooks;

  beforeEach(() => {
    hooks = new PipelineHooks({ logger: silent });
  });

  describe('screen questions', () => {
    it('should read the screen and put it first in the prompt', async () => {
      const sources = fakeSources();
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent, systemPrompt: 'Test prompt.' });

      const result = await pipeline.processTurn({ query: SCREEN_QUERY });

      expect(result.windowInfo).toBe(TERMINAL_WINDOW);
      expect(result.decision.queryType).toBe(QueryType.SCREEN_RELATED);
      expect(result.decision.useOcr).toBe(true);
      expect(result.decision.useWeb).toBe(false);
      expect(result.screenText).toBe(TRACEBACK);
      expect(result.webResults).toBe('');
      expect(sources.web.search).not.toHaveBeenCalled();

      expect(result.fused.fusionStrategy).toBe('Primary: screen (medium relevance), Supporting: 0 sources');
      expect(result.fused.relevanceSummary).toBe('Context analysis: 1 medium-relevance sources');
      expect(result.messages.slice(1)).toEqual([
        { role: 'user', content: `PRIMARY CONTEXT (Most Relevant):\nScreen Content (OCR):\n${TRACEBACK}` },
        { role: 'user', content: 'CONTEXT ANALYSIS: Context analysis: 1 medium-relevance sources' },
        { role: 'user', content: `USER QUERY: ${SCREEN_QUERY}` },
      ]);
      expect(result.messages[0]?.content.startsWith('Test prompt.\n\nCONTEXT ANALYSIS:')).toBe(true);
    });

    it('should key the session by the active window', async () => {
      const pipeline = new ContextPipeline({ sources: fakeSources(), hooks, logger: silent });

      const result = await pipeline.processTurn({ query: SCREEN_QUERY });

      expect(result.sessionId).toBe(new ConversationMemory().getSessionId(TERMINAL_WINDOW));
    });

    it('should reuse cached OCR text and carry history into the next turn', async () => {
      const sources = fakeSources();
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent });

      const first = await pipeline.processTurn({ query: SCREEN_QUERY });
      pipeline.recordReply(first.sessionId, 'That is a TypeError.');
      const second = await pipeline.processTurn({ query: SCREEN_QUERY });

      expect(sources.screen.readText).toHaveBeenCalledOnce();
      expect(second.screenText).toBe(TRACEBACK);
      expect(second.messages.slice(1, 3)).toEqual([
        { role: 'user', content: SCREEN_QUERY },
        { role: 'assistant', content: 'That is a TypeError.' },
      ]);
      expect(hooks.getMetrics()).toMatchObject({
        decisions: 2,
        ocrDecisions: 2,
        fusions: 2,
        turns: 2,
        // OCR decision and OCR text on the second turn
        cacheHits: 2,
        cacheMisses: 1,
      });
    });
  });

  describe('web questions', () => {
    it('should search with the decision parameters and configured safesearch', async () => {
      const sources = fakeSources(null);
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent });

      const result = await pipeline.processTurn({ query: NEWS_QUERY });

      expect(result.windowInfo).toBe('');
      expect(result.decision.queryType).toBe(QueryType.CURRENT_EVENTS);
      expect(sources.screen.readText).not.toHaveBeenCalled();
      expect(sources.web.search).toHaveBeenCalledWith(NEWS_QUERY, {
        maxResults: 5,
        safesearch: 'moderate',
        timelimit: 'd',
      });
      expect(result.webResults).toBe('- AI roundup\n  https://example.com/ai\n  New models were announced today.');
    });

    it('should answer a repeated search from the cache', async () => {
      const sources = fakeSources(null);
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent, webSearch: { safesearch: 'strict' } });

      await pipeline.processTurn({ query: NEWS_QUERY });
      const second = await pipeline.processTurn({ query: NEWS_QUERY });

      expect(sources.web.search).toHaveBeenCalledOnce();
      expect(sources.web.search).toHaveBeenCalledWith(NEWS_QUERY, {
        maxResults: 5,
        safesearch: 'strict',
        timelimit: 'd',
      });
      expect(second.webResults).toContain('AI roundup');
    });
  });

  describe('repeated questions', () => {
    const GC_QUERY = 'What are the best practices for garbage collection tuning in Java';
    const GC_RESULTS: WebSearchResult[] = [
      { title: 'GC tuning guide', href: 'https://example.com/gc', body: 'Size the heap before tuning pauses.' },
    ];

    it('should serve a similar cached search instead of searching again', async () => {
      const sources = fakeSources(null);
      sources.web.search.mockResolvedValue(GC_RESULTS);
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent });

      const first = await pipeline.processTurn({ query: GC_QUERY });
      const second = await pipeline.processTurn({ query: GC_QUERY });

      expect(first.decision.useWeb).toBe(true);
      expect(sources.web.search).toHaveBeenCalledOnce();
      expect(sources.web.search).toHaveBeenCalledWith(GC_QUERY, {
        maxResults: 5,
        safesearch: 'moderate',
        timelimit: 'm',
      });
      expect(second.decision.useWeb).toBe(false);
      expect(second.decision.cachedWebQuery).toBe(GC_QUERY);
      expect(second.webResults).toBe('- GC tuning guide\n  https://example.com/gc\n  Size the heap before tuning pauses.');
      expect(second.webResults).toBe(first.webResults);
    });
  });

  describe('collaborator failures', () => {
    it('should treat a failed source as empty and report it', async () => {
      const sources = fakeSources(null);
      sources.web.search.mockRejectedValue(new Error('service unavailable'));
      const failures: SourceFailedPayload[] = [];
      hooks.on('sourceFailed', payload => {
        failures.push(payload);
      });
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent });

      const result = await pipeline.processTurn({ query: NEWS_QUERY });

      expect(result.webResults).toBe('');
      expect(result.fused.fusionStrategy).toBe('No context fusion - insufficient relevance');
      expect(failures).toHaveLength(1);
      expect(failures[0]?.source).toBe('web');
      expect(failures[0]?.error).toBeInstanceOf(CollaboratorError);
      expect(failures[0]?.error.message).toBe('web collaborator failed during search - service unavailable');
      expect(hooks.getMetrics().turns).toBe(1);
    });

    it('should retry transient failures', async () => {
      const sources = fakeSources();
      sources.screen.readText.mockRejectedValueOnce(new Error('network error'));
      const pipeline = new ContextPipeline({
        sources,
        hooks,
        logger: silent,
        retry: { maxAttempts: 2, initialDelay: 1, jitter: 0 },
      });

      const result = await pipeline.processTurn({ query: SCREEN_QUERY });

      expect(sources.screen.readText).toHaveBeenCalledTimes(2);
      expect(result.screenText).toBe(TRACEBACK);
      expect(hooks.getMetrics().sourceFailures).toBe(0);
    });

    it('should report sources the decision wanted but nobody provides', async () => {
      const skipped: SourceSkippedPayload[] = [];
      hooks.on('sourceSkipped', payload => {
        skipped.push(payload);
      });
      const pipeline = new ContextPipeline({ sources: {}, hooks, logger: silent });

      const result = await pipeline.processTurn({ query: NEWS_QUERY });

      expect(result.decision.useWeb).toBe(true);
      expect(skipped.map(({ source, reason }) => ({ source, reason }))).toEqual([
        { source: 'web', reason: 'No web search source configured' },
      ]);
    });
  });

  describe('manual selection', () => {
    it('should skip the analyzer', async () => {
      const sources = fakeSources();
      const pipeline = new ContextPipeline({ sources, hooks, logger: silent });

      const result = await pipeline.processTurn({
        query: 'hi',
        manual: { useOcr: true, useWeb: false },
      });

      expect(result.decision).toEqual({
        useOcr: true,
        useWeb: false,
        queryType: QueryType.CONVERSATIONAL,
        confidence: 1.0,
        reasoning: 'Manual source selection',
      });
      expect(sources.screen.readText).toHaveBeenCalledOnce();
    });
  });

  describe('memory', () => {
    it('should store anonymized queries', async () => {
      const memory = new ConversationMemory({ anonymize: true, logger: silent });
      const pipeline = new ContextPipeline({ sources: {}, memory, hooks, logger: silent });

      const first = await pipeline.processTurn({ query: 'forward it to jane.doe@example.com' });
      const second = await pipeline.processTurn({ query: 'thanks' });

      expect(second.sessionId).toBe(first.sessionId);
      expect(second.messages).toContainEqual({ role: 'user', content: 'forward it to [EMAIL]' });
    });
  });

  describe('fromConfig', () => {
    it('should wire components from configuration', async () => {
      const config = loadConfig({
        env: { ASSISTANT_SYSTEM_PROMPT: 'Configured prompt.', ASSISTANT_CONVERSATION_MEMORY: 'false' },
      });
      const sources: PipelineSources = fakeSources();
      const pipeline = ContextPipeline.fromConfig(config, sources, { logger: silent, hooks });

      await pipeline.processTurn({ query: SCREEN_QUERY });
      const second = await pipeline.processTurn({ query: SCREEN_QUERY });

      expect(pipeline.getHooks()).toBe(hooks);
      expect(second.messages[0]?.content.startsWith('Configured prompt.')).toBe(true);
      // memory disabled: no history between turns
      expect(second.messages).toHaveLength(4);
    });
  });
});
