import { describe, expect, it, vi } from 'vitest';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts as not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    expect(token.reason).toBeUndefined();
  });

  it('records the reason given to cancel()', () => {
    const token = new CancellationToken();
    token.cancel('user interrupt');
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('user interrupt');
  });

  it('keeps the first reason when cancelled twice', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.cancel('first');
    token.cancel('second');
    expect(token.reason).toBe('first');
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('throwIfCancelled throws CancellationError with the reason', () => {
    const token = new CancellationToken();
    expect(() => token.throwIfCancelled()).not.toThrow();
    token.cancel('stop');
    expect(() => token.throwIfCancelled()).toThrow(CancellationError);
    expect(() => token.throwIfCancelled()).toThrow('stop');
  });

  it('throwIfCancelled falls back to a default message', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.throwIfCancelled()).toThrow('Operation was cancelled');
  });

  it('onCancel fires immediately if already cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    const callback = vi.fn();
    token.onCancel(callback);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel deduplicates the same callback reference', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.onCancel(callback);
    token.cancel();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('offCancel removes a callback', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.offCancel(callback);
    token.cancel();
    expect(callback).not.toHaveBeenCalled();
  });

  it('runs every callback and reports failures together', () => {
    const token = new CancellationToken();
    const after = vi.fn();
    token.onCancel(() => {
      throw new Error('callback error');
    });
    token.onCancel(after);

    expect(() => token.cancel()).toThrow(AggregateError);
    expect(token.isCancelled).toBe(true);
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('link aborts the controller on cancel', () => {
    const token = new CancellationToken();
    const controller = new AbortController();
    token.link(controller);

    token.cancel('halt');

    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBeInstanceOf(CancellationError);
    expect(controller.signal.reason).toHaveProperty('message', 'halt');
  });

  it('unlinked controllers are left alone', () => {
    const token = new CancellationToken();
    const controller = new AbortController();
    const unlink = token.link(controller);

    unlink();
    token.cancel();

    expect(controller.signal.aborted).toBe(false);
  });
});

describe('CancellationError', () => {
  it('has correct name', () => {
    const err = new CancellationError('test');
    expect(err.name).toBe('CancellationError');
    expect(err.message).toBe('test');
    expect(err).toBeInstanceOf(Error);
  });
});
