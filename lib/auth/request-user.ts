/**
 * Resolve the calling user from a request.
 *
 * Accepts `Authorization: Token <key>` and `Authorization: Bearer <key>`.
 * Streaming endpoints may also pass `?token=<key>` since EventSource cannot set headers.
 */

import type { NextRequest } from "next/server";
import type { DbAdapter } from "@/lib/db/adapter";
import type { UserRow } from "@/lib/db/types";

const AUTH_HEADER = /^(?:Token|Bearer)\s+(\S+)$/i;

export function tokenFromRequest(
  request: NextRequest,
  opts: { allowQuery?: boolean } = {}
): string | null {
  const header = request.headers.get("authorization");
  const match = header ? AUTH_HEADER.exec(header.trim()) : null;
  if (match) return match[1];
  if (opts.allowQuery) {
    const q = request.nextUrl.searchParams.get("token");
    if (q) return q;
  }
  return null;
}

/** The authenticated user, or null for anonymous and unknown tokens. */
export async function getRequestUser(
  request: NextRequest,
  db: DbAdapter,
  opts: { allowQuery?: boolean } = {}
): Promise<UserRow | null> {
  const key = tokenFromRequest(request, opts);
  if (!key) return null;
  return db.getUserByToken(key);
}

/** First hop of x-forwarded-for, then x-real-ip, else loopback. */
export function clientIp(request: NextRequest): string {
  const forwarded = request.headers.get("x-forwarded-for");
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) return first;
  }
  return request.headers.get("x-real-ip")?.trim() || "127.0.0.1";
}
