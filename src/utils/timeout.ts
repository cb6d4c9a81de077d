import { TimeoutError } from './errors';

/**
 * Race a task against a deadline. The task is abandoned, not cancelled, when
 * the deadline wins; its own request timeouts bound how long it lingers.
 */
export function withTimeout<T>(task: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  return Promise.race([task, deadline]).finally(() => {
    clearTimeout(timer);
  });
}
