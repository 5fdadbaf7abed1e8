/**
 * Collaborator call guard
 *
 * Every call into a host collaborator goes through the circuit of its
 * source (screen, web, window) and is retried on transient failures.
 * A source that keeps failing trips its own circuit; the others keep working.
 */

import { CircuitOpenError, ContextFusionError, wrapError } from './errors.js';
import type { ContextSource } from './types.js';

export interface RetryOptions {
  /** Attempts per call, the first included (default: 3) */
  maxAttempts?: number;

  /** Delay before the first retry in ms; doubles for each later one (default: 100) */
  initialDelay?: number;

  /** Upper bound on a single delay in ms (default: 5000) */
  maxDelay?: number;

  /** Random spread around each delay, as a fraction of it (default: 0.1) */
  jitter?: number;

  /** Which failures are worth another attempt (default: isTransientError) */
  shouldRetry?: (error: Error) => boolean;

  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface CircuitBreakerOptions {
  /** Failures among a source's remembered calls that open its circuit (default: 5) */
  failureThreshold?: number;

  /** Half-open successes in a row that close the circuit (default: 2) */
  successThreshold?: number;

  /** How long an open circuit rejects calls, in ms (default: 60000) */
  cooldownMs?: number;

  /** Calls remembered per source (default: 10) */
  windowSize?: number;
}

/**
 * Timeouts and connection trouble; our own errors never are
 */
export function isTransientError(error: Error): boolean {
  if (error instanceof ContextFusionError) {
    return false;
  }
  return /timeout|timed out|network|econnreset|econnrefused|etimedout/i.test(error.message);
}

/**
 * Wait before retry number `attempt` (1-based)
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const base = Math.min((options.initialDelay ?? 100) * 2 ** (attempt - 1), options.maxDelay ?? 5000);
  const spread = base * (options.jitter ?? 0.1);
  return Math.max(0, base + spread * (Math.random() * 2 - 1));
}

export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const shouldRetry = options.shouldRetry ?? isTransientError;

  let attempt = 1;
  while (true) {
    try {
      return await fn();
    } catch (thrown) {
      const error = thrown instanceof Error ? thrown : new Error(String(thrown));
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await new Promise<void>(resolve => setTimeout(resolve, delayMs));
      attempt++;
    }
  }
}

interface Circuit {
  state: CircuitState;
  /** Most recent last; true marks a failure */
  outcomes: boolean[];
  halfOpenSuccesses: number;
  openUntil: number;
}

/**
 * One circuit per collaborator source
 */
export class SourceCircuitBreakers {
  private circuits = new Map<ContextSource, Circuit>();
  private failureThreshold: number;
  private successThreshold: number;
  private cooldownMs: number;
  private windowSize: number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.successThreshold = options.successThreshold ?? 2;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.windowSize = options.windowSize ?? 10;
  }

  state(source: ContextSource): CircuitState {
    return this.circuit(source).state;
  }

  /**
   * Run one call for `source`. While its circuit is open the call is not
   * made and the promise rejects with CircuitOpenError.
   */
  async run<T>(source: ContextSource, fn: () => Promise<T>): Promise<T> {
    const circuit = this.circuit(source);

    if (circuit.state === CircuitState.OPEN) {
      if (Date.now() < circuit.openUntil) {
        throw new CircuitOpenError(source, circuit.openUntil);
      }
      circuit.state = CircuitState.HALF_OPEN;
      circuit.halfOpenSuccesses = 0;
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.recordFailure(circuit);
      throw error;
    }
    this.recordSuccess(circuit);
    return result;
  }

  private circuit(source: ContextSource): Circuit {
    let circuit = this.circuits.get(source);
    if (!circuit) {
      circuit = { state: CircuitState.CLOSED, outcomes: [], halfOpenSuccesses: 0, openUntil: 0 };
      this.circuits.set(source, circuit);
    }
    return circuit;
  }

  private remember(circuit: Circuit, failed: boolean): void {
    circuit.outcomes.push(failed);
    if (circuit.outcomes.length > this.windowSize) {
      circuit.outcomes.shift();
    }
  }

  private recordFailure(circuit: Circuit): void {
    this.remember(circuit, true);
    const failures = circuit.outcomes.filter(Boolean).length;

    if (circuit.state === CircuitState.HALF_OPEN || failures >= this.failureThreshold) {
      circuit.state = CircuitState.OPEN;
      circuit.openUntil = Date.now() + this.cooldownMs;
    }
  }

  private recordSuccess(circuit: Circuit): void {
    this.remember(circuit, false);
    if (circuit.state !== CircuitState.HALF_OPEN) {
      return;
    }

    circuit.halfOpenSuccesses++;
    if (circuit.halfOpenSuccesses >= this.successThreshold) {
      circuit.state = CircuitState.CLOSED;
      circuit.outcomes = [];
    }
  }
}

/**
 * Call a collaborator through its circuit, retrying transient failures.
 * An open circuit ends the retries. Whatever fails last is rethrown as a
 * CollaboratorError.
 */
export async function callCollaborator<T>(
  source: ContextSource,
  operation: string,
  fn: () => Promise<T>,
  breakers: SourceCircuitBreakers,
  options: RetryOptions = {}
): Promise<T> {
  try {
    return await retry(() => breakers.run(source, fn), options);
  } catch (error) {
    throw wrapError(error, source, operation);
  }
}
