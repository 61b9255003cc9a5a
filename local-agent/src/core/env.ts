/**
 * Environment Loading: <cacheDir>/.env via dotenv
 *
 * Existing environment variables take precedence over the file. A missing
 * file is fine; any other read failure is reported to the caller.
 */

import { config } from "dotenv";
import * as path from "path";
import { defaultCacheDir } from "./config.js";

export interface EnvLoadResult {
  path: string;
  loaded: boolean;
  error?: Error;
}

export function envPathFor(cacheDir: string): string {
  return path.join(cacheDir, ".env");
}

/**
 * Merge `<cacheDir>/.env` into process.env. Call once at startup, before
 * loadConfig(). The cache directory itself may be named in the
 * environment (IDLEWISE_CACHE_DIR) but not in the file.
 */
export function loadAgentEnv(cacheDir: string = defaultCacheDir()): EnvLoadResult {
  const envPath = envPathFor(cacheDir);
  const result = config({ path: envPath });

  if (result.error) {
    if ("code" in result.error && result.error.code === "ENOENT") {
      return { path: envPath, loaded: false };
    }
    return { path: envPath, loaded: false, error: result.error };
  }
  return { path: envPath, loaded: true };
}
