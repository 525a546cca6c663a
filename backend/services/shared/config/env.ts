// backend/services/shared/config/env.ts

import path from "path";
import fs from "fs";
import * as dotenv from "dotenv";
import { expand } from "dotenv-expand";

/**
 * Load a specific env file. Throws if the file is missing or invalid.
 * Variables already present in process.env win over the file.
 */
export function loadEnvFromFileOrThrow(envFilePath: string) {
  if (!envFilePath || envFilePath.trim() === "") {
    throw new Error("ENV_FILE is required but was not provided.");
  }
  const resolved = path.resolve(process.cwd(), envFilePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`ENV_FILE not found at: ${resolved}`);
  }

  const parsed = dotenv.config({ path: resolved });
  if (parsed.error) {
    throw new Error(
      `Failed to load ENV_FILE: ${resolved}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return resolved;
}

/**
 * Load the first env file that exists among `candidates`.
 * Returns the loaded path, or null when none exists (injected env only).
 */
export function loadFirstEnvFile(candidates: string[]): string | null {
  for (const c of candidates) {
    const resolved = path.resolve(process.cwd(), c);
    if (fs.existsSync(resolved)) return loadEnvFromFileOrThrow(resolved);
  }
  return null;
}

/** Read a trimmed env var; empty strings count as unset. */
export function readEnv(
  env: NodeJS.ProcessEnv,
  name: string
): string | undefined {
  const v = env[name];
  if (v == null) return undefined;
  const t = v.trim();
  return t === "" ? undefined : t;
}
