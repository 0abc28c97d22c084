import { describe, it, expect, vi, afterEach } from 'vitest';
import { withDeadline } from './deadline';
import { TimeoutError } from './errors';

describe('withDeadline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes the work through when there is no deadline or signal', async () => {
    const work = Promise.resolve('value');
    expect(withDeadline(work, undefined, 'getCurrent')).toBe(work);
  });

  it('rejects with TimeoutError when the deadline elapses first', async () => {
    vi.useFakeTimers();
    const pending = withDeadline(new Promise<string>(() => undefined), 50, 'getHistory');
    const assertion = expect(pending).rejects.toThrow('getHistory exceeded deadline of 50ms');

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it('resolves with the work when it settles before the deadline', async () => {
    vi.useFakeTimers();
    const work = new Promise<string>(resolve => setTimeout(() => resolve('ok'), 10));
    const pending = withDeadline(work, 50, 'getForecast');

    await vi.advanceTimersByTimeAsync(10);
    await expect(pending).resolves.toBe('ok');
  });

  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await withDeadline(Promise.resolve(1), 1000, 'getLocation', controller.signal).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty('message', 'getLocation aborted before start');
  });

  it('rejects when the signal aborts while waiting', async () => {
    const controller = new AbortController();
    const pending = withDeadline(new Promise<number>(() => undefined), undefined, 'listActiveAlerts', controller.signal);

    controller.abort();
    await expect(pending).rejects.toThrow('listActiveAlerts aborted');
  });
});
