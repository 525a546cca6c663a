// backend/services/phone-address/test/helpers/app.ts
import request from "supertest";
import { createApp } from "../../src/app";
import { loadConfig } from "../../src/config";
import {
  InMemoryKeyValueStore,
  RedisKeyValueStore,
  type KeyValueStore,
  type RedisCommands,
} from "../../src/repo/kvStore";

/** Fresh app over its own store; env overrides go through loadConfig. */
export function buildTestApp<S extends KeyValueStore = InMemoryKeyValueStore>(
  opts: { env?: NodeJS.ProcessEnv; store?: S } = {}
) {
  const config = loadConfig({ NODE_ENV: "test", ...opts.env });
  const store = opts.store ?? new InMemoryKeyValueStore();
  const app = createApp({ config, store });
  return { app, config, store, agent: request(app) };
}

/** node-redis stand-in whose every command fails like a refused socket. */
export function unreachableRedis(): RedisCommands {
  const refused = () =>
    Promise.reject(new Error("connect ECONNREFUSED 127.0.0.1:6379"));
  return { get: refused, set: refused, exists: refused, del: refused, ping: refused };
}

export function unreachableStore(): RedisKeyValueStore {
  return new RedisKeyValueStore(unreachableRedis());
}
