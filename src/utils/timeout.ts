// setTimeout 能接受的最大延迟 (2^31-1 ms, 约 24.8 天), 超出时 Node 会改成 1ms
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * 和 setTimeout 一样, 但支持任意长的延迟: 超过 MAX_TIMER_DELAY 时分段串联.
 * 返回取消函数.
 */
export function scheduleTimeout(callback: () => void, delayMs: number): () => void {
  let timer: NodeJS.Timeout | undefined;

  const arm = (remaining: number) => {
    if (remaining > MAX_TIMER_DELAY) {
      timer = setTimeout(() => arm(remaining - MAX_TIMER_DELAY), MAX_TIMER_DELAY);
    } else {
      timer = setTimeout(callback, remaining);
    }
  };
  arm(delayMs);

  return () => clearTimeout(timer);
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise<void>(resolve => {
    scheduleTimeout(resolve, delayMs);
  });
}

/**
 * 给 promise 加超时. 超时后原 promise 的结果被忽略, 不会产生未处理的 rejection.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const cancel = scheduleTimeout(() => reject(onTimeout()), timeoutMs);

    promise.then(
      value => {
        cancel();
        resolve(value);
      },
      (error: unknown) => {
        cancel();
        reject(error);
      }
    );
  });
}
