/**
 * Runs filesystem operations on one download's artifact one at a time,
 * in call order. A failed operation does not block the ones queued after it.
 */
export interface FileLock {
  run<T>(operation: () => Promise<T>): Promise<T>;
}

export function createFileLock(): FileLock {
  let tail: Promise<void> = Promise.resolve();

  return {
    run<T>(operation: () => Promise<T>): Promise<T> {
      const result = tail.then(operation);
      tail = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },
  };
}
