// backend/services/shared/utils/redis.ts
import { createClient } from "redis";
import { logger } from "./logger";

// Use the exact concrete client type from createClient()
export type RedisClient = ReturnType<typeof createClient>;

export type RedisClientOptions = {
  url: string;
  /** Connection attempts before the first `ready`; startup fails after this. */
  startupAttempts?: number;
};

// Throttle noisy error logs (e.g., when Redis is down)
const ERR_THROTTLE_MS = 5_000;

export function redactRedisUrl(url: string): string {
  try {
    const u = new URL(url);
    if (u.password) u.password = "***";
    if (u.username) u.username = "***";
    return u.toString();
  } catch {
    return url.replace(/\/\/([^@]+)@/, "//***@");
  }
}

/**
 * Build (but do not connect) a node-redis client.
 * - Commands fail immediately while disconnected (no offline queue).
 * - Before the first `ready`, gives up after `startupAttempts` so a bad URL
 *   fails the boot; afterwards reconnects with a capped backoff.
 */
export function createRedisClient(opts: RedisClientOptions): RedisClient {
  const startupAttempts = opts.startupAttempts ?? 3;
  let everReady = false;
  let lastErrAt = 0;

  const client = createClient({
    url: opts.url,
    disableOfflineQueue: true,
    socket: {
      reconnectStrategy(retries) {
        if (!everReady && retries >= startupAttempts) {
          return new Error(
            `redis unreachable after ${startupAttempts} attempts`
          );
        }
        return Math.min(1_000, Math.max(50, retries * 100));
      },
    },
  });

  client.on("ready", () => {
    everReady = true;
    logger.info({ component: "redis" }, "[redis] ready");
  });
  client.on("end", () => logger.info({ component: "redis" }, "[redis] end"));
  client.on("error", (err: unknown) => {
    const now = Date.now();
    if (now - lastErrAt >= ERR_THROTTLE_MS) {
      lastErrAt = now;
      logger.warn({ component: "redis", err }, "[redis] client error");
    }
  });

  return client;
}

export async function connectRedis(
  client: RedisClient,
  url: string
): Promise<RedisClient> {
  logger.info(
    { component: "redis", url: redactRedisUrl(url) },
    "[redis] connecting"
  );
  await client.connect().catch((err: unknown) => {
    logger.error({ component: "redis", err }, "[redis] connect failed");
    throw err;
  });
  return client;
}

export async function closeRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) return;
  await client.quit();
}
