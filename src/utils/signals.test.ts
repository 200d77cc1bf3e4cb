import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { createTimeoutSignal, mergeSignals } from './signals.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('createTimeoutSignal', () => {
  it('returns null when disabled', () => {
    expect(createTimeoutSignal()).toBeNull();
    expect(createTimeoutSignal(0)).toBeNull();
    expect(createTimeoutSignal(false)).toBeNull();
  });

  it('aborts after the configured timeout with a TimeoutError', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    expect(timeout?.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(50);

    expect(timeout?.signal.aborted).toBe(true);
    expect(timeout?.signal.reason).toBeInstanceOf(TimeoutError);
    expect(timeout?.signal.reason).toHaveProperty('message', 'error request timed out after 50ms');
  });

  it('creates independent signals for separate invocations', () => {
    vi.useFakeTimers();

    const first = createTimeoutSignal(10);
    const second = createTimeoutSignal(20);

    vi.advanceTimersByTime(15);

    expect(first?.signal.aborted).toBe(true);
    expect(second?.signal.aborted).toBe(false);
  });

  it('never aborts once cleared', async () => {
    vi.useFakeTimers();
    const timeout = createTimeoutSignal(50);

    timeout?.clear();
    await vi.advanceTimersByTimeAsync(100);

    expect(timeout?.signal.aborted).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('mergeSignals', () => {
  it('returns null when no signals are provided', () => {
    expect(mergeSignals([])).toBeNull();
    expect(mergeSignals([null, undefined])).toBeNull();
  });

  it('returns the single active signal when only one is provided', () => {
    const controller = new AbortController();

    expect(mergeSignals([controller.signal, null])).toBe(controller.signal);
  });

  it('propagates aborts and preserves the provided reason', () => {
    const caller = new AbortController();
    const timeout = new AbortController();
    const merged = mergeSignals([caller.signal, timeout.signal]);

    const reason = new AbortError('caller gave up');
    caller.abort(reason);

    expect(merged?.aborted).toBe(true);
    expect(merged?.reason).toBe(reason);
  });

  it('immediately aborts when merging an already-aborted signal', () => {
    const controller = new AbortController();
    const reason = new Error('existing abort');
    controller.abort(reason);

    const merged = mergeSignals([controller.signal, new AbortController().signal]);

    expect(merged?.aborted).toBe(true);
    expect(merged?.reason).toBe(reason);
  });

  it('detaches from the remaining sources once aborted', () => {
    const first = new AbortController();
    const second = new AbortController();
    const removeListener = vi.spyOn(second.signal, 'removeEventListener');

    mergeSignals([first.signal, second.signal]);
    first.abort(new AbortError('stop'));

    expect(removeListener).toHaveBeenCalledWith('abort', expect.any(Function));
  });

  it('follows the timeout of a merged timeout signal', async () => {
    vi.useFakeTimers();
    const merged = mergeSignals([new AbortController().signal, createTimeoutSignal(30)?.signal]);

    await vi.advanceTimersByTimeAsync(30);

    expect(merged?.reason).toBeInstanceOf(TimeoutError);
  });
});
