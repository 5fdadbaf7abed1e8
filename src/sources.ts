/**
 * Text shapes exchanged with the host's collaborators
 * (window detection and web search).
 */

import type { WebSearchResult, WindowInfo } from './types.js';
import { extractWords } from './utils.js';

const WINDOW_LINE = /^Active window: (.*?)(?: \(process: ([^)]*)\))?$/i;

/**
 * "Active window: <title> (process: <name>)", or "" without a title
 */
export function formatWindowInfo(info: WindowInfo | null | undefined): string {
  if (!info || !info.title.trim()) {
    return '';
  }

  let line = `Active window: ${info.title}`;
  if (info.processName) {
    line += ` (process: ${info.processName})`;
  }
  return line;
}

/**
 * Inverse of formatWindowInfo; null for text in any other shape
 */
export function parseWindowInfo(text: string): WindowInfo | null {
  const match = WINDOW_LINE.exec(text.trim());
  if (!match || !match[1]) {
    return null;
  }

  const info: WindowInfo = { title: match[1] };
  if (match[2]) {
    info.processName = match[2];
  }
  return info;
}

/**
 * Words naming the active application: the last " - " segment of the
 * title plus the process name without its extension.
 */
export function applicationTerms(windowInfo: string): Set<string> {
  const parsed = parseWindowInfo(windowInfo);
  const sources: string[] = [];

  if (parsed) {
    const segments = parsed.title.split(' - ');
    sources.push(segments[segments.length - 1] ?? parsed.title);
    if (parsed.processName) {
      sources.push(parsed.processName.replace(/\.[a-z0-9]+$/i, ''));
    }
  } else {
    sources.push(windowInfo);
  }

  const terms = new Set<string>();
  for (const source of sources) {
    for (const word of extractWords(source)) {
      if (word.length > 2) terms.add(word);
    }
  }
  return terms;
}

/**
 * Plain-text rendering of web search results for prompts
 */
export function formatWebResults(results: readonly WebSearchResult[]): string {
  return results.map(r => `- ${r.title}\n  ${r.href}\n  ${r.body}`).join('\n');
}
