/**
 * Mutual exclusion across processes, keyed by name. Used to serialize flushes of the modified index.
 */
export interface LockProvider {
  /**
   * Runs `fn` while holding `key`. The lock expires after `ttlSeconds` if its holder dies.
   */
  withLock<T>(key: string, ttlSeconds: number, fn: () => Promise<T>): Promise<T>;
}

/**
 * Runs `fn` straight away. Enough for a single process.
 */
export class NoopLockProvider implements LockProvider {
  async withLock<T>(_key: string, _ttlSeconds: number, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}
