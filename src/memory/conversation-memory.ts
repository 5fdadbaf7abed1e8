/**
 * Conversation Memory
 *
 * Per-session message log feeding prompt construction. Each session keeps
 * at most `maxContextMessages × 2` messages (oldest dropped first).
 * Messages older than the retention window are purged lazily, at most
 * once an hour, and sessions left empty are removed.
 */

import type { ConversationMessage, LLMMessage, MessageRole } from '../types.js';
import { ConfigurationError } from '../errors.js';
import { Logger, defaultLogger } from '../logger.js';
import { hashContent } from '../utils.js';

const HOUR_MS = 60 * 60 * 1000;

/** Stored messages a session needs before it gets a digest */
const SUMMARY_MIN_MESSAGES = 10;
const SUMMARY_MIN_USER_MESSAGES = 5;
const SUMMARY_EDGE_MESSAGES = 3;
const SUMMARY_SNIPPET_LENGTH = 100;

const REDACTIONS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN]'],
  [/\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g, '[CARD]'],
  [/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL]'],
];

export interface ConversationMemoryOptions {
  /** Record and return history at all (default: true) */
  enabled?: boolean;

  /** Messages returned as history; twice this many are stored (default: 10) */
  maxContextMessages?: number;

  /** Age after which messages are purged (default: 24) */
  dataRetentionHours?: number;

  /** Produce a digest of long sessions (default: false) */
  autoSummarize?: boolean;

  /** Allow redaction of sensitive patterns (default: false) */
  anonymize?: boolean;

  logger?: Logger;
}

export interface HistoryOptions {
  /** Keep system messages (default: true) */
  includeSystem?: boolean;
}

export interface MemoryStats {
  activeSessions: number;
  totalMessages: number;
  summariesCached: number;
  memoryEnabled: boolean;
  maxContextMessages: number;
  dataRetentionHours: number;
}

export class ConversationMemory {
  private sessions = new Map<string, ConversationMessage[]>();
  private summaries = new Map<string, string>();
  private lastCleanup: number;
  private readonly enabled: boolean;
  private readonly maxContextMessages: number;
  private readonly dataRetentionHours: number;
  private readonly autoSummarize: boolean;
  private readonly anonymize: boolean;
  private logger: Logger;

  constructor(options: ConversationMemoryOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.maxContextMessages = options.maxContextMessages ?? 10;
    this.dataRetentionHours = options.dataRetentionHours ?? 24;
    this.autoSummarize = options.autoSummarize ?? false;
    this.anonymize = options.anonymize ?? false;
    this.logger = (options.logger ?? defaultLogger).child('memory');
    this.lastCleanup = Date.now();

    if (!Number.isInteger(this.maxContextMessages) || this.maxContextMessages <= 0) {
      throw new ConfigurationError('maxContextMessages must be a positive integer', {
        maxContextMessages: this.maxContextMessages,
      });
    }
    if (!(this.dataRetentionHours > 0)) {
      throw new ConfigurationError('dataRetentionHours must be positive', {
        dataRetentionHours: this.dataRetentionHours,
      });
    }
  }

  /**
   * Deterministic session id for a window context ("default" when empty)
   */
  getSessionId(windowContext: string = ''): string {
    return hashContent(windowContext || 'default');
  }

  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {}
  ): void {
    if (!this.enabled) {
      return;
    }

    let messages = this.sessions.get(sessionId);
    if (!messages) {
      messages = [];
      this.sessions.set(sessionId, messages);
    }

    messages.push({ role, content, timestamp: Date.now(), metadata });
    while (messages.length > this.maxContextMessages * 2) {
      messages.shift();
    }

    this.summaries.delete(sessionId);
    this.cleanupOldData();
  }

  /**
   * The most recent `maxContextMessages` messages, oldest first
   */
  getConversationHistory(sessionId: string, options: HistoryOptions = {}): LLMMessage[] {
    const { includeSystem = true } = options;
    const messages = this.sessions.get(sessionId);
    if (!this.enabled || !messages) {
      return [];
    }

    return messages
      .filter(message => includeSystem || message.role !== 'system')
      .slice(-this.maxContextMessages)
      .map(({ role, content }) => ({ role, content }));
  }

  /**
   * Digest of the session's first and last user messages, or null when
   * summarizing is off or the session is too short
   */
  getContextSummary(sessionId: string): string | null {
    if (!this.autoSummarize) {
      return null;
    }

    const cached = this.summaries.get(sessionId);
    if (cached !== undefined) {
      return cached;
    }

    const messages = this.sessions.get(sessionId);
    if (!messages || messages.length <= SUMMARY_MIN_MESSAGES) {
      return null;
    }

    const userMessages = messages.filter(m => m.role === 'user').map(m => m.content);
    if (userMessages.length <= SUMMARY_MIN_USER_MESSAGES) {
      return null;
    }

    const topics = [
      ...userMessages.slice(0, SUMMARY_EDGE_MESSAGES),
      ...userMessages.slice(-SUMMARY_EDGE_MESSAGES),
    ].map(content => content.slice(0, SUMMARY_SNIPPET_LENGTH));

    const summary = `Previous conversation topics: ${topics.join('; ')}`;
    this.summaries.set(sessionId, summary);
    return summary;
  }

  clearSession(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.summaries.delete(sessionId);
  }

  clearAllSessions(): void {
    this.sessions.clear();
    this.summaries.clear();
  }

  /**
   * Redact SSNs, card numbers and email addresses in place.
   * No-op unless anonymization is enabled.
   */
  anonymizeSessionData(sessionId: string): void {
    const messages = this.sessions.get(sessionId);
    if (!this.anonymize || !messages) {
      return;
    }

    let redacted = 0;
    for (const message of messages) {
      const content = REDACTIONS.reduce(
        (text, [pattern, replacement]) => text.replace(pattern, replacement),
        message.content
      );
      if (content !== message.content) {
        message.content = content;
        redacted++;
      }
    }

    this.summaries.delete(sessionId);
    this.logger.debug('Anonymized session', { sessionId, redacted });
  }

  getMemoryStats(): MemoryStats {
    let totalMessages = 0;
    for (const messages of this.sessions.values()) {
      totalMessages += messages.length;
    }

    return {
      activeSessions: this.sessions.size,
      totalMessages,
      summariesCached: this.summaries.size,
      memoryEnabled: this.enabled,
      maxContextMessages: this.maxContextMessages,
      dataRetentionHours: this.dataRetentionHours,
    };
  }

  private cleanupOldData(): void {
    const now = Date.now();
    if (now - this.lastCleanup < HOUR_MS) {
      return;
    }

    this.lastCleanup = now;
    const cutoff = now - this.dataRetentionHours * HOUR_MS;
    let purged = 0;
    let removedSessions = 0;

    for (const [sessionId, messages] of this.sessions) {
      const before = messages.length;
      while (messages.length > 0 && (messages[0]?.timestamp ?? now) < cutoff) {
        messages.shift();
      }
      if (messages.length < before) {
        purged += before - messages.length;
        this.summaries.delete(sessionId);
      }

      if (messages.length === 0) {
        this.clearSession(sessionId);
        removedSessions++;
      }
    }

    if (purged > 0) {
      this.logger.info('Retention sweep', { purged, removedSessions });
    }
  }
}
