import {
  deserializeSession,
  NoopLockProvider,
  serializeSession,
  type LockProvider,
  type Logger,
  type SessionSnapshot,
  type SessionStore,
} from "@sidstore/core";
import {
  RedisClientManager,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  setWithTtl,
} from "./internal/redisClient";
import { toRedisError } from "./internal/redisErrors";

/**
 * Codec contract for custom snapshot serialization in Redis.
 */
export type SessionCodec<TValue> = {
  serialize: (snapshot: SessionSnapshot<TValue>) => string;
  deserialize: (raw: string) => SessionSnapshot<TValue>;
};

/**
 * Configuration for {@link RedisSessionPersister}.
 */
export type RedisSessionPersisterOptions<TValue> = {
  keyPrefix?: string;
  codec?: SessionCodec<TValue>;
  lockProvider?: LockProvider;
  lockTtlSeconds?: number;
  logger?: Logger;
};

export type FlushResult = {
  written: number;
  failed: number;
  expired: number; // idle past the store's timeout; cleared without a write
  skipped: number; // removed from the store while the flush was running
};

const DEFAULT_KEY_PREFIX = "sidstore:sess:";
const DEFAULT_LOCK_TTL_SECONDS = 10;
const FLUSH_LOCK_KEY = "flush";

/**
 * Drains a {@link SessionStore}'s modified index into Redis.
 */
export class RedisSessionPersister<TValue> {
  private readonly keyPrefix: string;
  private readonly codec: SessionCodec<TValue>;
  private readonly lockProvider: LockProvider;
  private readonly lockTtlSeconds: number;
  private readonly logger: Logger | undefined;
  private readonly clientManager: RedisClientManager;

  constructor(connection: RedisConnectionInput, options?: RedisSessionPersisterOptions<TValue>) {
    this.clientManager = new RedisClientManager(connection);
    this.keyPrefix = options?.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.codec = options?.codec ?? { serialize: serializeSession, deserialize: deserializeSession };
    this.lockProvider = options?.lockProvider ?? new NoopLockProvider();
    this.lockTtlSeconds = options?.lockTtlSeconds ?? DEFAULT_LOCK_TTL_SECONDS;
    this.logger = options?.logger;
  }

  /**
   * Writes every session in the store's modified index. Each snapshot expires where its
   * session's inactivity window ends, counted from its `lastModified`.
   *
   * An entry is cleared only if its session did not change while being written; a failed
   * write leaves it for the next flush. A session removed from the store before its write
   * is skipped, and one removed during its write is deleted again.
   */
  async flush(store: SessionStore<TValue>): Promise<FlushResult> {
    return this.lockProvider.withLock(FLUSH_LOCK_KEY, this.lockTtlSeconds, async () => {
      const client = await this.connect();
      const result: FlushResult = { written: 0, failed: 0, expired: 0, skipped: 0 };

      for (const [uid, session] of store.modifiedEntries()) {
        if (store.getModified(uid) !== session) {
          result.skipped += 1;
          continue;
        }

        const snapshot = session.snapshot();
        const ttlSeconds = remainingTtlSeconds(snapshot, store.requirements.timeoutMs);
        if (ttlSeconds <= 0) {
          store.clearModified(uid, snapshot.revision);
          result.expired += 1;
          continue;
        }

        const key = this.makeKey(snapshot.uid);
        try {
          await setWithTtl(client, key, this.codec.serialize(snapshot), ttlSeconds);
        } catch (error) {
          result.failed += 1;
          this.logger?.warn("Failed to persist session.", { error: toRedisError(error, { phase: "flush" }) });
          continue;
        }

        if (store.getModified(uid) !== session) {
          await this.discard(client, key);
          result.skipped += 1;
          continue;
        }

        store.clearModified(uid, snapshot.revision);
        result.written += 1;
      }

      this.logger?.debug("Flushed modified sessions.", result);
      return result;
    });
  }

  /**
   * Reads the last persisted snapshot of `uid`. Unreadable payloads read as `null`.
   */
  async load(uid: string): Promise<SessionSnapshot<TValue> | null> {
    const client = await this.connect();

    let raw: string | null;
    try {
      raw = await client.get(this.makeKey(uid));
    } catch (error) {
      throw toRedisError(error, { phase: "load" });
    }
    if (raw === null) {
      return null;
    }

    try {
      return this.codec.deserialize(raw);
    } catch (error) {
      this.logger?.debug("Discarding unreadable session snapshot.", { error });
      return null;
    }
  }

  async delete(uid: string): Promise<void> {
    const client = await this.connect();
    try {
      await client.del(this.makeKey(uid));
    } catch (error) {
      throw toRedisError(error, { phase: "delete" });
    }
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  /**
   * Exposes the client manager so a {@link RedisLockProvider} can share the connection.
   */
  getClientManager(): RedisClientManager {
    return this.clientManager;
  }

  private async discard(client: RedisClientLike, key: string): Promise<void> {
    try {
      await client.del(key);
    } catch (error) {
      // the snapshot still expires with its ttl
      this.logger?.warn("Failed to delete removed session.", { error: toRedisError(error, { phase: "flush" }) });
    }
  }

  private async connect(): Promise<RedisClientLike> {
    try {
      return await this.clientManager.getClient();
    } catch (error) {
      throw toRedisError(error, { phase: "connect" });
    }
  }

  private makeKey(uid: string): string {
    return `${this.keyPrefix}${uid}`;
  }
}

function remainingTtlSeconds(snapshot: SessionSnapshot<unknown>, timeoutMs: number): number {
  return Math.ceil((snapshot.lastModified + timeoutMs - Date.now()) / 1000);
}

export type { RedisClientLike, RedisConnectionInput, RedisConnectionParams };
