import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  retry,
  backoffDelay,
  callCollaborator,
  isTransientError,
  SourceCircuitBreakers,
  CircuitState,
} from '../src/retry.js';
import { CircuitOpenError, CollaboratorError, ConfigurationError } from '../src/errors.js';

describe('retry', () => {
  it('should retry transient failures with doubling delays', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('network down'))
      .mockRejectedValueOnce(new Error('request timed out'))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    const result = await retry(fn, { initialDelay: 1, jitter: 0, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt, delayMs]) => [attempt, delayMs])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('should rethrow failures that are not transient at once', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('invalid query'));

    await expect(retry(fn, { initialDelay: 1 })).rejects.toThrow('invalid query');
    expect(fn).toHaveBeenCalledOnce();
  });

  it('should give up after maxAttempts', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('timeout'));

    await expect(retry(fn, { maxAttempts: 2, initialDelay: 1, jitter: 0 })).rejects.toThrow('timeout');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should honour a custom retry condition', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue(42);

    await expect(retry(fn, { initialDelay: 1, shouldRetry: () => true })).resolves.toBe(42);
  });
});

describe('backoffDelay', () => {
  it('should double from the initial delay up to the cap', () => {
    expect(backoffDelay(1, { jitter: 0 })).toBe(100);
    expect(backoffDelay(3, { jitter: 0 })).toBe(400);
    expect(backoffDelay(10, { jitter: 0 })).toBe(5000);
    expect(backoffDelay(2, { initialDelay: 50, maxDelay: 80, jitter: 0 })).toBe(80);
  });

  it('should spread delays by the jitter fraction', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(backoffDelay(1)).toBe(110);

    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(backoffDelay(1)).toBe(90);
  });
});

describe('isTransientError', () => {
  it('should accept network and timeout errors', () => {
    expect(isTransientError(new Error('read ECONNRESET'))).toBe(true);
    expect(isTransientError(new Error('Network unreachable'))).toBe(true);
    expect(isTransientError(new Error('Operation timed out'))).toBe(true);
  });

  it('should treat context-fusion errors and other failures as final', () => {
    expect(isTransientError(new ConfigurationError('timeout too small'))).toBe(false);
    expect(isTransientError(new CircuitOpenError('web', 0))).toBe(false);
    expect(isTransientError(new Error('bad request'))).toBe(false);
  });
});

describe('SourceCircuitBreakers', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should open only the circuit of the failing source', async () => {
    const breakers = new SourceCircuitBreakers({ failureThreshold: 2 });
    const failing = vi.fn().mockRejectedValue(new Error('down'));

    await expect(breakers.run('web', failing)).rejects.toThrow('down');
    expect(breakers.state('web')).toBe(CircuitState.CLOSED);
    await expect(breakers.run('web', failing)).rejects.toThrow('down');
    expect(breakers.state('web')).toBe(CircuitState.OPEN);

    const search = vi.fn().mockResolvedValue('results');
    await expect(breakers.run('web', search)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(search).not.toHaveBeenCalled();

    expect(breakers.state('screen')).toBe(CircuitState.CLOSED);
    await expect(breakers.run('screen', () => Promise.resolve('text'))).resolves.toBe('text');
  });

  it('should close again after enough half-open successes', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
    const breakers = new SourceCircuitBreakers({ failureThreshold: 1, successThreshold: 2, cooldownMs: 1000 });

    await expect(breakers.run('screen', () => Promise.reject(new Error('down')))).rejects.toThrow('down');
    expect(breakers.state('screen')).toBe(CircuitState.OPEN);

    vi.advanceTimersByTime(1000);
    await breakers.run('screen', () => Promise.resolve(1));
    expect(breakers.state('screen')).toBe(CircuitState.HALF_OPEN);

    await breakers.run('screen', () => Promise.resolve(2));
    expect(breakers.state('screen')).toBe(CircuitState.CLOSED);
  });

  it('should reopen when a half-open call fails', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T10:00:00Z'));
    const breakers = new SourceCircuitBreakers({ failureThreshold: 1, cooldownMs: 1000 });

    await expect(breakers.run('web', () => Promise.reject(new Error('down')))).rejects.toThrow('down');
    vi.advanceTimersByTime(1000);
    await expect(breakers.run('web', () => Promise.reject(new Error('still down')))).rejects.toThrow('still down');

    expect(breakers.state('web')).toBe(CircuitState.OPEN);
    await expect(breakers.run('web', () => Promise.resolve(1))).rejects.toThrow(
      'web circuit is open until 2026-01-15T10:00:02.000Z'
    );
  });

  it('should only count failures among the remembered calls', async () => {
    const breakers = new SourceCircuitBreakers({ failureThreshold: 2, windowSize: 2 });

    await expect(breakers.run('window', () => Promise.reject(new Error('down')))).rejects.toThrow('down');
    await breakers.run('window', () => Promise.resolve(null));
    await breakers.run('window', () => Promise.resolve(null));
    await expect(breakers.run('window', () => Promise.reject(new Error('down')))).rejects.toThrow('down');

    expect(breakers.state('window')).toBe(CircuitState.CLOSED);
  });
});

describe('callCollaborator', () => {
  it('should stop retrying once the circuit opens', async () => {
    const breakers = new SourceCircuitBreakers({ failureThreshold: 2 });
    const fn = vi.fn().mockRejectedValue(new Error('network error'));

    const failure = await callCollaborator('web', 'search', fn, breakers, {
      maxAttempts: 5,
      initialDelay: 1,
      jitter: 0,
    }).catch((error: unknown) => error);

    expect(fn).toHaveBeenCalledTimes(2);
    expect(failure).toBeInstanceOf(CollaboratorError);
    if (failure instanceof CollaboratorError) {
      expect(failure.source).toBe('web');
      expect(failure.originalError).toBeInstanceOf(CircuitOpenError);
    }
  });

  it('should report the last failure as a collaborator error', async () => {
    const breakers = new SourceCircuitBreakers();

    await expect(
      callCollaborator('screen', 'readText', () => Promise.reject(new Error('bad request')), breakers)
    ).rejects.toThrow('screen collaborator failed during readText - bad request');
  });

  it('should pass results through', async () => {
    const breakers = new SourceCircuitBreakers();

    await expect(callCollaborator('window', 'getActiveWindow', () => Promise.resolve('Notes'), breakers)).resolves.toBe(
      'Notes'
    );
  });
});
