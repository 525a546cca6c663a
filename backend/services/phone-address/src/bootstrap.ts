// backend/services/phone-address/src/bootstrap.ts
import { loadEnvFromFileOrThrow, loadFirstEnvFile } from "@shared/config/env";

// ENV_FILE is mandatory when set; otherwise a local .env is optional.
const explicit = (process.env.ENV_FILE || "").trim();
const loaded = explicit
  ? loadEnvFromFileOrThrow(explicit)
  : loadFirstEnvFile([".env"]);

process.env.SERVICE_NAME ||= "phone-address";

export const ENV_FILE_LOADED = loaded;
