/**
 * Runtime tunables read from the environment (after loadConfigIntoEnv).
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function getBcryptRounds(): number {
  return intFromEnv("BCRYPT_ROUNDS", 10);
}

export function getPageSize(): number {
  return intFromEnv("PAGE_SIZE", 20);
}

export function getPublicBaseUrl(): string {
  const url = process.env.PUBLIC_BASE_URL?.trim() || "http://localhost:3000";
  return url.replace(/\/+$/, "");
}

/** Largest accepted upload, in bytes. */
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export const MAX_CAPTION_LENGTH = 2200;

export const MAX_COMMENT_LENGTH = 500;
