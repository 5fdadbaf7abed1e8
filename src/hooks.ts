import type { ContextDecision, ContextSource, FusedContext } from './types.js';
import type { CacheKind } from './performance/performance-optimizer.js';
import { Logger, defaultLogger } from './logger.js';

/**
 * Event types emitted while processing chat turns
 */
export type PipelineEventType =
  | 'decisionMade'
  | 'contextFused'
  | 'cacheHit'
  | 'cacheMiss'
  | 'sourceSkipped'
  | 'sourceFailed'
  | 'turnCompleted';

/**
 * Base event payload
 */
export interface BaseEventPayload {
  timestamp: number;
}

export interface DecisionMadePayload extends BaseEventPayload {
  query: string;
  decision: ContextDecision;
}

export interface ContextFusedPayload extends BaseEventPayload {
  query: string;
  fused: FusedContext;
}

export interface CacheEventPayload extends BaseEventPayload {
  kind: CacheKind;
}

/**
 * A source the decision asked for was not fetched
 */
export interface SourceSkippedPayload extends BaseEventPayload {
  source: ContextSource;
  reason: string;
}

export interface SourceFailedPayload extends BaseEventPayload {
  source: ContextSource;
  error: Error;
}

export interface TurnCompletedPayload extends BaseEventPayload {
  sessionId: string;
  durationMs: number;
}

/**
 * Event payload map
 */
export interface PipelineEventMap {
  decisionMade: DecisionMadePayload;
  contextFused: ContextFusedPayload;
  cacheHit: CacheEventPayload;
  cacheMiss: CacheEventPayload;
  sourceSkipped: SourceSkippedPayload;
  sourceFailed: SourceFailedPayload;
  turnCompleted: TurnCompletedPayload;
}

/**
 * Event listener type
 */
export type EventListener<T extends PipelineEventType> = (
  payload: PipelineEventMap[T]
) => void | Promise<void>;

export type AnyEventListener = (
  event: PipelineEventType,
  payload: PipelineEventMap[PipelineEventType]
) => void | Promise<void>;

type ListenerRegistry = {
  [T in PipelineEventType]: Set<EventListener<T>>;
};

/**
 * Counters collected from emitted events
 */
export interface PipelineMetrics {
  decisions: number;
  /** Decisions with useOcr set */
  ocrDecisions: number;
  /** Decisions with useWeb set */
  webDecisions: number;
  fusions: number;
  cacheHits: number;
  cacheMisses: number;
  skippedSources: number;
  sourceFailures: number;
  turns: number;
  /** Mean duration of the most recent turns, in ms */
  averageTurnTime: number;
}

export interface PipelineHooksOptions {
  /** Where listener failures are reported */
  logger?: Logger;
}

/**
 * Hooks and Metrics System
 *
 * Provides:
 * - Typed events for every stage of a chat turn
 * - Built-in metrics collection
 * - Custom hook registration
 *
 * @example
 * ```ts
 * const hooks = new PipelineHooks();
 *
 * hooks.on('decisionMade', ({ decision }) => {
 *   audit.record(decision.queryType, decision.reasoning);
 * });
 *
 * hooks.onAny((event, payload) => {
 *   logger.debug(`pipeline: ${event}`, { ...payload });
 * });
 *
 * const metrics = hooks.getMetrics();
 * ```
 */
export class PipelineHooks {
  private listeners: ListenerRegistry = createRegistry();
  private anyListeners = new Set<AnyEventListener>();
  private metrics: PipelineMetrics;
  private turnTimes: number[] = [];
  private maxTurnTimeHistory = 1000;
  private logger: Logger;

  constructor(options: PipelineHooksOptions = {}) {
    this.metrics = this.createInitialMetrics();
    this.logger = (options.logger ?? defaultLogger).child('hooks');
  }

  private createInitialMetrics(): PipelineMetrics {
    return {
      decisions: 0,
      ocrDecisions: 0,
      webDecisions: 0,
      fusions: 0,
      cacheHits: 0,
      cacheMisses: 0,
      skippedSources: 0,
      sourceFailures: 0,
      turns: 0,
      averageTurnTime: 0,
    };
  }

  /**
   * Register an event listener. Returns an unsubscribe function.
   */
  on<T extends PipelineEventType>(event: T, listener: EventListener<T>): () => void {
    const listeners: Set<EventListener<T>> = this.listeners[event];
    listeners.add(listener);

    return () => {
      listeners.delete(listener);
    };
  }

  /**
   * Register a listener for all events
   */
  onAny(listener: AnyEventListener): () => void {
    this.anyListeners.add(listener);
    return () => {
      this.anyListeners.delete(listener);
    };
  }

  /**
   * Remove an event listener
   */
  off<T extends PipelineEventType>(event: T, listener: EventListener<T>): void {
    const listeners: Set<EventListener<T>> = this.listeners[event];
    listeners.delete(listener);
  }

  /**
   * Emit an event. Listener failures, sync or async, are logged and
   * never reach the emitter.
   */
  emit<T extends PipelineEventType>(event: T, payload: PipelineEventMap[T]): void {
    this.updateMetrics(event, payload);

    const listeners: Set<EventListener<T>> = this.listeners[event];
    for (const listener of listeners) {
      this.invoke(event, () => listener(payload));
    }

    for (const listener of this.anyListeners) {
      this.invoke(event, () => listener(event, payload));
    }
  }

  private invoke(event: PipelineEventType, call: () => void | Promise<void>): void {
    try {
      const result = call();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportListenerError(event, error));
      }
    } catch (error) {
      this.reportListenerError(event, error);
    }
  }

  private reportListenerError(event: PipelineEventType, error: unknown): void {
    this.logger.warn(
      `Error in event listener for ${event}`,
      undefined,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  /**
   * Update metrics based on events
   */
  private updateMetrics(
    event: PipelineEventType,
    payload: PipelineEventMap[PipelineEventType]
  ): void {
    switch (event) {
      case 'decisionMade': {
        this.metrics.decisions++;
        if ('decision' in payload) {
          if (payload.decision.useOcr) this.metrics.ocrDecisions++;
          if (payload.decision.useWeb) this.metrics.webDecisions++;
        }
        break;
      }
      case 'contextFused': {
        this.metrics.fusions++;
        break;
      }
      case 'cacheHit': {
        this.metrics.cacheHits++;
        break;
      }
      case 'cacheMiss': {
        this.metrics.cacheMisses++;
        break;
      }
      case 'sourceSkipped': {
        this.metrics.skippedSources++;
        break;
      }
      case 'sourceFailed': {
        this.metrics.sourceFailures++;
        break;
      }
      case 'turnCompleted': {
        this.metrics.turns++;
        if ('durationMs' in payload) {
          this.recordTurnTime(payload.durationMs);
        }
        break;
      }
    }
  }

  private recordTurnTime(ms: number): void {
    this.turnTimes.push(ms);

    // Keep only recent measurements
    if (this.turnTimes.length > this.maxTurnTimeHistory) {
      this.turnTimes.shift();
    }

    this.metrics.averageTurnTime =
      this.turnTimes.reduce((a, b) => a + b, 0) / this.turnTimes.length;
  }

  /**
   * Get current metrics
   */
  getMetrics(): Readonly<PipelineMetrics> {
    return { ...this.metrics };
  }

  /**
   * Reset all metrics
   */
  resetMetrics(): void {
    this.metrics = this.createInitialMetrics();
    this.turnTimes = [];
  }

  /**
   * Remove all listeners
   */
  removeAllListeners(): void {
    this.listeners = createRegistry();
    this.anyListeners.clear();
  }
}

function createRegistry(): ListenerRegistry {
  return {
    decisionMade: new Set(),
    contextFused: new Set(),
    cacheHit: new Set(),
    cacheMiss: new Set(),
    sourceSkipped: new Set(),
    sourceFailed: new Set(),
    turnCompleted: new Set(),
  };
}

/**
 * Create a metrics reporting hook
 */
export function createMetricsReporter(
  reportFn: (metrics: Readonly<PipelineMetrics>) => void,
  hooks: PipelineHooks,
  intervalMs: number = 60000
): { start: () => void; stop: () => void } {
  let timer: ReturnType<typeof setInterval> | null = null;

  return {
    start: () => {
      if (timer) return;
      timer = setInterval(() => {
        reportFn(hooks.getMetrics());
      }, intervalMs);
    },
    stop: () => {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
