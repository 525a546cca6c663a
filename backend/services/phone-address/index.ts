// backend/services/phone-address/index.ts
import { ENV_FILE_LOADED } from "./src/bootstrap"; // loads env before config

import { SERVICE_NAME, loadConfig } from "./src/config";
import { createApp } from "./src/app";
import { RedisKeyValueStore } from "./src/repo/kvStore";
import { initLogger, logger } from "@shared/utils/logger";
import { createRedisClient, connectRedis } from "@shared/utils/redis";
import { startHttpService } from "@shared/bootstrap/startHttpService";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start() {
  const config = loadConfig();
  initLogger(SERVICE_NAME, config.logLevel);
  logger.info(
    { envFile: ENV_FILE_LOADED, apiPrefix: config.apiV1Prefix || "/" },
    `[${SERVICE_NAME}] starting ${config.projectName}`
  );

  const client = createRedisClient({ url: config.redisUrl });
  await connectRedis(client, config.redisUrl);
  const store = RedisKeyValueStore.fromClient(client);

  const app = createApp({ config, store });
  await startHttpService({
    app,
    port: config.port,
    serviceName: SERVICE_NAME,
    logger,
    onShutdown: () => store.close(),
  });
}

start().catch((err: unknown) => {
  logger.error({ err }, `failed to start ${SERVICE_NAME} service`);
  process.exit(1);
});
