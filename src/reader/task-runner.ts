/**
 * Dispatches heavy work (file read, decode, normalize, slicing) away from the
 * caller's stack. The chunk store only ever mutates its own state in the
 * continuation of the returned promise, so all publication happens in one
 * place regardless of where the task itself ran.
 */
export interface TaskRunner {
  run<T>(task: () => T | Promise<T>): Promise<T>;
}

/**
 * Default runner: queues the task behind pending I/O callbacks with
 * `setImmediate`, letting already-queued work (e.g. transport requests)
 * proceed before a large decode starts.
 */
export const deferredRunner: TaskRunner = {
  run<T>(task: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        Promise.resolve().then(task).then(resolve, reject);
      });
    });
  },
};
