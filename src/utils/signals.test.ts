import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns a null signal when disabled', () => {
    expect(createTimeoutSignal().signal).toBeNull();
    expect(createTimeoutSignal(0).signal).toBeNull();
    expect(createTimeoutSignal(false).signal).toBeNull();
  });

  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const { signal } = createTimeoutSignal(50);

    expect(signal?.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toBeInstanceOf(TimeoutError);
    expect(signal?.reason.message).toBe('error request timed out after 50ms');
  });

  it('never aborts once released', async () => {
    vi.useFakeTimers();
    const { signal, release } = createTimeoutSignal(50);

    release();
    await vi.advanceTimersByTimeAsync(100);

    expect(signal?.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('mergeSignals', () => {
  it('returns a null signal when no signals are provided', () => {
    expect(mergeSignals([]).signal).toBeNull();
    expect(mergeSignals([null, undefined]).signal).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();

    expect(mergeSignals([controller.signal, null]).signal).toBe(controller.signal);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const controllerA = new AbortController();
    const controllerB = new AbortController();
    const { signal } = mergeSignals([controllerA.signal, controllerB.signal]);

    const abortReason = new AbortError('external abort');
    controllerB.abort(abortReason);

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toBe(abortReason);
  });

  it('immediately aborts when merging an already-aborted signal', () => {
    const controller = new AbortController();
    const reason = new Error('existing abort');
    controller.abort(reason);

    const { signal } = mergeSignals([controller.signal, new AbortController().signal]);

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toBe(reason);
  });

  it('detaches from long-lived sources on release', () => {
    const longLived = new AbortController();
    const removeSpy = vi.spyOn(longLived.signal, 'removeEventListener');
    const perRequest = new AbortController();

    const { signal, release } = mergeSignals([perRequest.signal, longLived.signal]);
    release();
    longLived.abort(new AbortError('client was disposed'));

    expect(removeSpy).toHaveBeenCalledWith('abort', expect.any(Function));
    expect(signal?.aborted).toBe(false);
  });
});
