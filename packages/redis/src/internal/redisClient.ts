/**
 * The slice of a Redis client used here. node-redis v4 and ioredis both fit.
 */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(...args: unknown[]): Promise<unknown>;
  del(key: string): Promise<number | unknown>;
  setEx?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  setex?(key: string, ttlSeconds: number, value: string): Promise<unknown>;
  eval?(...args: unknown[]): Promise<unknown>;
  connect?(): Promise<unknown>;
  quit?(): Promise<unknown>;
  disconnect?(): Promise<unknown>;
  isOpen?: boolean;
  status?: string;
}

export type RedisConnectionParams = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  tls?: boolean;
  lazyConnect?: boolean;
  redisOptions?: Record<string, unknown>;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean; // close() quits the client when true
  lazyConnect?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

type CreateClient = (options?: Record<string, unknown>) => RedisClientLike;

/**
 * Hands out one client per input, creating it from connection params on first use.
 */
export class RedisClientManager {
  private readonly owned: boolean;
  private client: RedisClientLike | null = null;
  private pending: Promise<RedisClientLike> | null = null;

  constructor(private readonly input: RedisConnectionInput) {
    if (isRedisClientLike(input)) {
      this.owned = false;
      this.client = input;
    } else if (isClientWrapper(input)) {
      this.owned = input.manageClient ?? false;
      this.client = input.client;
    } else {
      this.owned = true;
    }
  }

  async getClient(): Promise<RedisClientLike> {
    if (this.client) {
      await connectIfNeeded(this.client, lazyConnectOf(this.input));
      return this.client;
    }

    this.pending ??= this.createClient();
    this.client = await this.pending;
    return this.client;
  }

  async close(): Promise<void> {
    if (!this.owned || (!this.client && !this.pending)) {
      return;
    }

    const client = await this.getClient();
    if (client.quit) {
      await client.quit();
    } else if (client.disconnect) {
      await client.disconnect();
    }
  }

  private async createClient(): Promise<RedisClientLike> {
    const params = this.input;
    if (isRedisClientLike(params) || isClientWrapper(params)) {
      throw new Error("RedisClientManager: client input already resolved.");
    }

    const redisModule: { createClient?: unknown } = await import("redis");
    if (typeof redisModule.createClient !== "function") {
      throw new Error("redis.createClient is not available. Ensure the 'redis' package is installed.");
    }

    const createClient = redisModule.createClient as CreateClient;
    const client = createClient(toNodeRedisOptions(params));
    await connectIfNeeded(client, params.lazyConnect ?? false);
    return client;
  }
}

export function normalizeTtl(ttlSeconds: number): number {
  const ttl = Math.floor(ttlSeconds);
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new Error("ttlSeconds must be a positive integer.");
  }
  return ttl;
}

export async function setWithTtl(
  client: RedisClientLike,
  key: string,
  value: string,
  ttlSeconds: number,
): Promise<void> {
  if (client.setEx) {
    await client.setEx(key, ttlSeconds, value);
  } else if (client.setex) {
    await client.setex(key, ttlSeconds, value);
  } else {
    await client.set(key, value, { EX: ttlSeconds });
  }
}

/**
 * `SET key value NX EX ttl`. Resolves `true` when the key was written.
 */
export async function setNxWithTtl(
  client: RedisClientLike,
  key: string,
  value: string,
  ttlSeconds: number,
): Promise<boolean> {
  const result = client.setex
    ? await client.set(key, value, "EX", ttlSeconds, "NX") // ioredis argument style
    : await client.set(key, value, { NX: true, EX: ttlSeconds });
  return result === "OK" || result === true;
}

const RELEASE_SCRIPT = [
  "if redis.call('get', KEYS[1]) == ARGV[1] then",
  "  return redis.call('del', KEYS[1])",
  "end",
  "return 0",
].join("\n");

/**
 * Deletes `key` only while it still holds `token`.
 */
export async function releaseLockIfOwned(client: RedisClientLike, key: string, token: string): Promise<void> {
  if (client.eval) {
    if (client.setex) {
      await client.eval(RELEASE_SCRIPT, 1, key, token);
    } else {
      await client.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
    }
    return;
  }

  if ((await client.get(key)) === token) {
    await client.del(key);
  }
}

export function isRedisClientLike(value: unknown): value is RedisClientLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "get" in value &&
    typeof value.get === "function" &&
    "set" in value &&
    typeof value.set === "function" &&
    "del" in value &&
    typeof value.del === "function"
  );
}

export function isClientWrapper(value: unknown): value is RedisClientWrapper {
  return typeof value === "object" && value !== null && "client" in value && isRedisClientLike(value.client);
}

function lazyConnectOf(input: RedisConnectionInput): boolean {
  if (isRedisClientLike(input)) return false;
  return input.lazyConnect ?? false;
}

function toNodeRedisOptions(params: RedisConnectionParams): Record<string, unknown> {
  const options: Record<string, unknown> = { ...(params.redisOptions ?? {}) };
  const socket: Record<string, unknown> = {};

  if (params.host) socket.host = params.host;
  if (params.port !== undefined) socket.port = params.port;
  if (params.tls) socket.tls = true;

  if (Object.keys(socket).length > 0) {
    const base = options.socket;
    options.socket = typeof base === "object" && base !== null ? { ...base, ...socket } : socket;
  }

  if (params.url) options.url = params.url;
  if (params.username) options.username = params.username;
  if (params.password) options.password = params.password;
  if (params.database !== undefined) options.database = params.database;

  return options;
}

async function connectIfNeeded(client: RedisClientLike, lazy: boolean): Promise<void> {
  if (lazy || isClientReady(client)) {
    return;
  }

  if (client.connect) {
    await client.connect();
  }
}

function isClientReady(client: RedisClientLike): boolean {
  if (client.isOpen === true) {
    return true;
  }

  if (typeof client.status === "string") {
    return client.status === "ready" || client.status === "connect" || client.status === "connecting";
  }

  return false;
}
