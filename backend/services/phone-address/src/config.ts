// backend/services/phone-address/src/config.ts
/**
 * Config:
 * - No dotenv loading here (bootstrap.ts loads env files).
 * - Every option has a default; invalid values fail at startup.
 * - Result is frozen and passed to the components that need it.
 */
import { z } from "zod";
import { isLogLevel } from "@shared/utils/logger";
import { readEnv } from "@shared/config/env";

export const SERVICE_NAME = "phone-address" as const;

export const DEFAULTS = {
  projectName: "Phone Address Service",
  apiV1Prefix: "/api/v1",
  redisUrl: "redis://localhost:6379/0",
  port: 8000,
  logLevel: "info",
  normalizePhoneKeys: false,
} as const;

const zPrefix = z
  .string()
  .regex(/^\/\S*$/, "must start with '/' and contain no spaces")
  .refine((p) => p === "/" || !p.endsWith("/"), "must not end with '/'")
  .transform((p) => (p === "/" ? "" : p));

function protocolOf(u: string): string | null {
  try {
    return new URL(u).protocol;
  } catch {
    return null;
  }
}

const zRedisUrl = z
  .string()
  .refine(
    (u) => /^rediss?:$/.test(protocolOf(u) ?? ""),
    "must be a redis:// or rediss:// URL"
  );

const zBoolFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const zConfig = z.object({
  env: z.string(),
  projectName: z.string().min(1),
  apiV1Prefix: zPrefix,
  redisUrl: zRedisUrl,
  port: z.coerce.number().int().min(0).max(65535),
  logLevel: z.string().refine(isLogLevel, "unknown log level"),
  normalizePhoneKeys: z.union([z.boolean(), zBoolFlag]),
});

/** `apiV1Prefix` is "" when the routes are mounted at the root. */
export type PhoneAddressConfig = Readonly<z.output<typeof zConfig>>;

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): PhoneAddressConfig {
  const parsed = zConfig.safeParse({
    env: readEnv(env, "NODE_ENV") ?? "development",
    projectName: readEnv(env, "PROJECT_NAME") ?? DEFAULTS.projectName,
    apiV1Prefix: readEnv(env, "API_V1_PREFIX") ?? DEFAULTS.apiV1Prefix,
    redisUrl: readEnv(env, "REDIS_URL") ?? DEFAULTS.redisUrl,
    port: readEnv(env, "PORT") ?? DEFAULTS.port,
    logLevel: (readEnv(env, "LOG_LEVEL") ?? DEFAULTS.logLevel).toLowerCase(),
    normalizePhoneKeys:
      readEnv(env, "PHONE_NORMALIZE_KEYS")?.toLowerCase() ??
      DEFAULTS.normalizePhoneKeys,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`[${SERVICE_NAME}] invalid configuration: ${problems}`);
  }

  return Object.freeze({ ...parsed.data });
}
