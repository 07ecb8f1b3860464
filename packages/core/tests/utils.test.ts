import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ExtractionError,
  Semaphore,
  readBoolean,
  readCount,
  readNullableString,
  throwIfCancelled,
  withRetries,
  withTimeout,
} from '../src/index.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('withTimeout', () => {
  it('rejects with QUERY_TIMEOUT once the deadline passes', async () => {
    vi.useFakeTimers();
    const never = new Promise<never>(() => {});
    const pending = withTimeout(never, 50);
    const assertion = expect(pending).rejects.toMatchObject({ code: 'QUERY_TIMEOUT' });
    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('passes through when no deadline is set', async () => {
    await expect(withTimeout(Promise.resolve(7), undefined)).resolves.toBe(7);
    await expect(withTimeout(Promise.resolve(8), 0)).resolves.toBe(8);
  });
});

describe('throwIfCancelled', () => {
  it('throws CANCELLED for an aborted signal', () => {
    const controller = new AbortController();
    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    controller.abort();
    expect(() => throwIfCancelled(controller.signal, 'schemaExtraction')).toThrowError(ExtractionError);
  });
});

describe('withRetries', () => {
  it('retries retryable failures up to the attempt budget', async () => {
    let calls = 0;
    const result = await withRetries(
      async () => {
        calls++;
        if (calls < 3) throw new Error('flaky');
        return 'ok';
      },
      { attempts: 3, baseDelayMs: 0 },
      () => true
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
  });

  it('does not retry when the error is not retryable', async () => {
    let calls = 0;
    await expect(
      withRetries(
        async () => {
          calls++;
          throw new Error('fatal');
        },
        { attempts: 5, baseDelayMs: 0 },
        () => false
      )
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('makes a single attempt by default', async () => {
    const onRetry = vi.fn();
    await expect(
      withRetries(async () => Promise.reject(new Error('once')), undefined, () => true, onRetry)
    ).rejects.toThrow('once');
    expect(onRetry).not.toHaveBeenCalled();
  });
});

describe('Semaphore', () => {
  it('never runs more than maxConcurrency tasks at once', async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        semaphore.use(async () => {
          running++;
          peak = Math.max(peak, running);
          await new Promise((resolve) => setTimeout(resolve, 5));
          running--;
        })
      )
    );

    expect(peak).toBe(2);
    expect(semaphore.inFlight).toBe(0);
    expect(semaphore.queueDepth).toBe(0);
  });

  it('releases the slot when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.use(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(semaphore.inFlight).toBe(0);
  });

  it('rejects a non-positive bound', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore maxConcurrency must be >= 1 (got 0)');
  });
});

describe('row readers', () => {
  it('normalises driver representations', () => {
    expect(readCount({ n: '42' }, 'n')).toBe(42);
    expect(readCount({ n: 42n }, 'n')).toBe(42);
    expect(readBoolean({ v: 'YES' }, 'v')).toBe(true);
    expect(readBoolean({ v: 0 }, 'v')).toBe(false);
    expect(readNullableString({ v: null }, 'v')).toBeNull();
    expect(() => readCount({ n: null }, 'n')).toThrow('Expected a numeric value for "n", got null');
  });
});
