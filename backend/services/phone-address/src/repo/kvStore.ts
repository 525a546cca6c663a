// backend/services/phone-address/src/repo/kvStore.ts
import { StoreUnavailableError } from "@shared/http/errors";
import { closeRedis, type RedisClient } from "@shared/utils/redis";

/**
 * Key-value primitives the record service needs. No business knowledge.
 * Absence is a value (`null` / `false`), never an error; anything the store
 * itself fails on is a StoreUnavailableError.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** Unconditional overwrite. */
  set(key: string, value: string): Promise<void>;
  exists(key: string): Promise<boolean>;
  /** Resolves true only when a key was actually removed. */
  delete(key: string): Promise<boolean>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/** The node-redis commands this adapter calls. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  exists(key: string): Promise<number>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
}

export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly client: RedisCommands,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  static fromClient(client: RedisClient): RedisKeyValueStore {
    const commands: RedisCommands = {
      get: (key) => client.get(key),
      set: (key, value) => client.set(key, value),
      exists: (key) => client.exists(key),
      del: (key) => client.del(key),
      ping: () => client.ping(),
    };
    return new RedisKeyValueStore(commands, () => closeRedis(client));
  }

  async get(key: string): Promise<string | null> {
    return this.run("get", () => this.client.get(key));
  }

  async set(key: string, value: string): Promise<void> {
    await this.run("set", () => this.client.set(key, value));
  }

  async exists(key: string): Promise<boolean> {
    const n = await this.run("exists", () => this.client.exists(key));
    return n > 0;
  }

  async delete(key: string): Promise<boolean> {
    const n = await this.run("delete", () => this.client.del(key));
    return n > 0;
  }

  async ping(): Promise<boolean> {
    const pong = await this.client.ping().catch(() => null);
    return pong === "PONG";
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new StoreUnavailableError(operation, err);
    }
  }
}

/** In-process store with the same contract; used by tests. */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async exists(key: string): Promise<boolean> {
    return this.data.has(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.data.clear();
  }

  get size(): number {
    return this.data.size;
  }
}
