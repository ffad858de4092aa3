import { randomUUID } from "node:crypto";
import { SidstoreError, type LockProvider, type Logger } from "@sidstore/core";
import {
  RedisClientManager,
  type RedisClientLike,
  type RedisConnectionInput,
  normalizeTtl,
  releaseLockIfOwned,
  setNxWithTtl,
} from "./internal/redisClient";
import { toRedisError } from "./internal/redisErrors";

export type RedisLockProviderOptions = {
  keyPrefix?: string;
  acquireTimeoutMs?: number;
  retryDelayMs?: number;
  logger?: Logger;
};

/**
 * Either a connection of its own or the persister whose connection should be shared.
 */
export type RedisLockProviderInput = RedisConnectionInput | { persister: ClientManagerOwner };

/**
 * Anything that hands out its client manager, such as a `RedisSessionPersister`.
 */
export type ClientManagerOwner = {
  getClientManager(): RedisClientManager;
};

const DEFAULT_KEY_PREFIX = "sidstore:lock:";
const DEFAULT_ACQUIRE_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_DELAY_MS = 50;

/**
 * {@link LockProvider} on `SET NX EX`, released only by the holder's token.
 */
export class RedisLockProvider implements LockProvider {
  private readonly keyPrefix: string;
  private readonly acquireTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger | undefined;
  private readonly clientManager: RedisClientManager;
  private readonly ownsClientManager: boolean;

  constructor(input: RedisLockProviderInput, options?: RedisLockProviderOptions) {
    if (isPersisterInput(input)) {
      this.clientManager = input.persister.getClientManager();
      this.ownsClientManager = false;
    } else {
      this.clientManager = new RedisClientManager(input);
      this.ownsClientManager = true;
    }
    this.keyPrefix = options?.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.acquireTimeoutMs = options?.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
    this.retryDelayMs = options?.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.logger = options?.logger;
  }

  async withLock<T>(key: string, ttlSeconds: number, fn: () => Promise<T>): Promise<T> {
    const ttl = normalizeTtl(ttlSeconds);
    const lockKey = `${this.keyPrefix}${key}`;
    const token = randomUUID();

    let client: RedisClientLike;
    let acquired: boolean;
    try {
      client = await this.clientManager.getClient();
      acquired = await this.acquire(client, lockKey, token, ttl);
    } catch (error) {
      throw toRedisError(error, { lockKey, phase: "acquire" });
    }

    if (!acquired) {
      throw new SidstoreError("LOCK_TIMEOUT", "Failed to acquire lock within timeout.", undefined, {
        lockKey,
        ttlSeconds: ttl,
        acquireTimeoutMs: this.acquireTimeoutMs,
      });
    }

    let failed = false;
    try {
      return await fn();
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      try {
        await releaseLockIfOwned(client, lockKey, token);
      } catch (error) {
        // the lock still expires after ttl; fn's own error takes precedence
        if (!failed) {
          throw toRedisError(error, { lockKey, phase: "release" });
        }
        this.logger?.warn("Failed to release lock.", { lockKey, error });
      }
    }
  }

  async close(): Promise<void> {
    if (this.ownsClientManager) {
      await this.clientManager.close();
    }
  }

  private async acquire(client: RedisClientLike, lockKey: string, token: string, ttlSeconds: number): Promise<boolean> {
    const deadline = Date.now() + this.acquireTimeoutMs;

    for (;;) {
      if (await setNxWithTtl(client, lockKey, token, ttlSeconds)) {
        return true;
      }
      if (Date.now() + this.retryDelayMs > deadline) {
        return false;
      }
      await sleep(this.retryDelayMs);
    }
  }
}

function isPersisterInput(input: RedisLockProviderInput): input is { persister: ClientManagerOwner } {
  return typeof input === "object" && input !== null && "persister" in input;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
