import { setImmediate as nextTurn } from 'node:timers/promises';

/**
 * Lazy description of asynchronous work. Nothing happens until it is called.
 * @public
 */
export type Task<T> = () => Promise<T>;

/**
 * Decides when a {@link Task} starts.
 * @public
 */
export interface TaskExecutor {
  run<T>(task: Task<T>): Promise<T>;
}

/**
 * Starts the task synchronously on the caller's tick.
 * @public
 */
export const directExecutor: TaskExecutor = {
  run<T>(task: Task<T>): Promise<T> {
    return task();
  },
};

/**
 * Starts the task on the next turn of the event loop.
 * @public
 */
export const deferredExecutor: TaskExecutor = {
  async run<T>(task: Task<T>): Promise<T> {
    await nextTurn();
    return task();
  },
};

/**
 * Derives a task that transforms the result of `task` once it has run.
 * @public
 */
export function mapTask<T, U>(task: Task<T>, fn: (value: T) => U): Task<U> {
  return async () => fn(await task());
}
