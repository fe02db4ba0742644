import { MAX_TIMER_DELAY, scheduleTimeout, sleep, withTimeout } from '../../src/utils/timeout';

// 720h, longer than a single setTimeout can hold
const LONG_DELAY = 720 * 60 * 60 * 1000;

describe('timeout utilities', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('scheduleTimeout should honour delays above the timer limit', () => {
    const callback = jest.fn();
    scheduleTimeout(callback, LONG_DELAY);

    jest.advanceTimersByTime(MAX_TIMER_DELAY);
    expect(callback).not.toHaveBeenCalled();

    jest.advanceTimersByTime(LONG_DELAY - MAX_TIMER_DELAY - 1);
    expect(callback).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  test('scheduleTimeout should cancel a chained wait', () => {
    const callback = jest.fn();
    const cancel = scheduleTimeout(callback, LONG_DELAY);

    jest.advanceTimersByTime(MAX_TIMER_DELAY + 1000);
    cancel();
    jest.advanceTimersByTime(LONG_DELAY);

    expect(callback).not.toHaveBeenCalled();
    expect(jest.getTimerCount()).toBe(0);
  });

  test('withTimeout should reject only after a long timeout has fully elapsed', async () => {
    let outcome: unknown;
    withTimeout(new Promise<never>(() => undefined), LONG_DELAY, () => new Error('timed out')).catch(
      (error: unknown) => {
        outcome = error;
      }
    );

    await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY);
    expect(outcome).toBeUndefined();

    await jest.advanceTimersByTimeAsync(LONG_DELAY - MAX_TIMER_DELAY);
    expect(outcome).toEqual(new Error('timed out'));
  });

  test('withTimeout should clear its timer once the promise settles', async () => {
    await expect(withTimeout(Promise.resolve('ready'), LONG_DELAY, () => new Error('timed out'))).resolves.toBe('ready');
    expect(jest.getTimerCount()).toBe(0);
  });

  test('sleep should resolve after a long delay', async () => {
    let woke = false;
    void sleep(LONG_DELAY).then(() => {
      woke = true;
    });

    await jest.advanceTimersByTimeAsync(LONG_DELAY - 1);
    expect(woke).toBe(false);

    await jest.advanceTimersByTimeAsync(1);
    expect(woke).toBe(true);
  });
});
