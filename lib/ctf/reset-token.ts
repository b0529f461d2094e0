/**
 * Password reset links have the form `/reset-password/{uid}/{token}` where
 * `uid = base64(username)` and `token = {uuid}-{base64(username)}`.
 * The token is predictable on purpose; `inspectResetLink` reports the first
 * way a submitted link deviates from that shape.
 */

import { randomUUID } from "crypto";
import type { BugSlug } from "./catalogue";

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;
const utf8 = new TextDecoder("utf-8", { fatal: true });

export function encodeBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

/** Strict decode: padded standard alphabet and valid UTF-8, else null. */
export function decodeBase64(value: string): string | null {
  if (value.length % 4 !== 0 || !BASE64.test(value)) return null;
  try {
    return utf8.decode(Buffer.from(value, "base64"));
  } catch {
    return null;
  }
}

export function buildResetLink(baseUrl: string, username: string): { uid: string; token: string; url: string } {
  const uid = encodeBase64(username);
  const token = `${randomUUID()}-${uid}`;
  return { uid, token, url: `${baseUrl}/reset-password/${uid}/${token}/` };
}

export type ResetInspection =
  | { kind: "clean"; username: string }
  | {
      kind: "bug";
      slug: BugSlug;
      /** Decoded uid, when it decoded. */
      targetUsername: string | null;
      tokenUsername: string | null;
    };

export function inspectResetLink(uid: string, token: string): ResetInspection {
  const username = decodeBase64(uid);
  if (username === null) {
    return { kind: "bug", slug: "reset-invalid-uid", targetUsername: null, tokenUsername: null };
  }
  const bug = (slug: BugSlug, tokenUsername: string | null = null): ResetInspection => ({
    kind: "bug",
    slug,
    targetUsername: username,
    tokenUsername,
  });

  if (!token.includes("-")) return bug("reset-invalid-token");
  if (token.startsWith("-") || token.endsWith("-") || token === "---") {
    return bug("reset-malformed-token");
  }

  const suffix = token.slice(token.lastIndexOf("-") + 1);
  const tokenUsername = decodeBase64(suffix);
  if (tokenUsername === null) return bug("reset-invalid-base64");
  if (tokenUsername !== username) return bug("reset-predictable-token", tokenUsername);

  return { kind: "clean", username };
}
