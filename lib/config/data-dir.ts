/**
 * Centralized data directory and config file management.
 *
 * All Shutterbug data lives under a single directory (default: ~/.shutterbug/).
 * Layout:
 *   ~/.shutterbug/
 *     config          key=value config file (feature flags, tunables)
 *     shutterbug.db   SQLite database
 *     media/          uploaded post images and profile pictures
 *
 * Override with SHUTTERBUG_DATA_DIR env var.
 */

import * as path from "path";
import * as fs from "fs";

export function getDataDir(): string {
  const env = process.env.SHUTTERBUG_DATA_DIR;
  if (env) return env;
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  return path.join(home, ".shutterbug");
}

export function ensureDataDir(): string {
  const dir = getDataDir();
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getConfigPath(): string {
  return path.join(getDataDir(), "config");
}

export function getMediaDir(): string {
  const dir = path.join(getDataDir(), "media");
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getSqlitePath(): string {
  return process.env.SQLITE_PATH ?? path.join(ensureDataDir(), "shutterbug.db");
}

/**
 * Parse the config file into a Record<string, string>.
 * Supports KEY=VALUE, KEY="VALUE", and # comments.
 */
export function readConfigFile(): Record<string, string> {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) return {};

  const content = fs.readFileSync(configPath, "utf-8");
  const result: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx < 1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    result[key] = value;
  }
  return result;
}

/**
 * Load config file values into process.env (without overwriting existing vars).
 * Called from instrumentation on server start so route handlers see the values.
 */
export function loadConfigIntoEnv(): void {
  const config = readConfigFile();
  for (const [key, value] of Object.entries(config)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}
