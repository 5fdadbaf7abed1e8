import type { FusedContext, LLMMessage } from '../types.js';
import { NO_RELEVANT_SOURCES_SUMMARY } from '../fusion/data-fusion.js';

export interface PromptInput {
  systemPrompt: string;
  query: string;
  fused: FusedContext;
  /** Prior turns, oldest first */
  history?: LLMMessage[];
  /** Digest of earlier turns, if any */
  summary?: string | null;
}

const CONTEXT_USAGE_INSTRUCTIONS = [
  'INSTRUCTIONS FOR CONTEXT USAGE:',
  '- Focus primarily on the most relevant context provided',
  '- Use supporting context to supplement your understanding when helpful',
  '- If context seems irrelevant to the query, acknowledge this and focus on the direct question',
  '- When referencing screen content, be specific about what you see',
  '- When using web results, cite sources and focus on recent/relevant information',
  '- Combine context sources intelligently when they complement each other',
].join('\n');

/**
 * Chat-completion messages for one turn: system prompt with context
 * guidance, optional digest, history, fused context, then the query.
 */
export function buildPromptMessages(input: PromptInput): LLMMessage[] {
  const { fused, history = [], summary } = input;
  const hasContext = Boolean(fused.primaryContext || fused.supportingContext);

  let systemContent = input.systemPrompt;
  if (hasContext) {
    systemContent +=
      `\n\nCONTEXT ANALYSIS: ${fused.relevanceSummary}\n` +
      `FUSION STRATEGY: ${fused.fusionStrategy}\n\n` +
      CONTEXT_USAGE_INSTRUCTIONS;
  }

  const messages: LLMMessage[] = [{ role: 'system', content: systemContent }];

  if (summary) {
    messages.push({ role: 'system', content: `Previous conversation summary: ${summary}` });
  }

  messages.push(...history);

  if (fused.primaryContext) {
    messages.push({ role: 'user', content: `PRIMARY CONTEXT (Most Relevant):\n${fused.primaryContext}` });
  }
  if (fused.supportingContext) {
    messages.push({ role: 'user', content: `SUPPORTING CONTEXT:\n${fused.supportingContext}` });
  }
  if (fused.relevanceSummary !== NO_RELEVANT_SOURCES_SUMMARY) {
    messages.push({ role: 'user', content: `CONTEXT ANALYSIS: ${fused.relevanceSummary}` });
  }

  messages.push({ role: 'user', content: `USER QUERY: ${input.query}` });
  return messages;
}
