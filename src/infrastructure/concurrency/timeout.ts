export type TimedResult<T> = { timedOut: false; value: T } | { timedOut: true };

// settles with { timedOut: true } instead of rejecting; the task itself keeps running
export function withTimeout<T>(task: Promise<T>, timeoutMs: number): Promise<TimedResult<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<TimedResult<T>>(resolve => {
    timer = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });

  return Promise.race([task.then(value => ({ timedOut: false as const, value })), timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
