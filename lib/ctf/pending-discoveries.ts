/**
 * Discoveries made without a token wait in pending_discovery until the
 * player signs in. Two claim keys exist:
 *   login:<ip>:<username>  brute-force detection, 30 min
 *   session:<sid>          tampered reset links, 1 h, sid from the ctf_session cookie
 */

import { randomUUID } from "crypto";
import type { NextRequest } from "next/server";
import type { DbAdapter } from "@/lib/db/adapter";
import { RESET_BUG_SLUGS, type BugSlug } from "./catalogue";

export const SESSION_COOKIE = "ctf_session";
export const LOGIN_DISCOVERY_TTL_MS = 30 * 60 * 1000;
export const SESSION_DISCOVERY_TTL_MS = 60 * 60 * 1000;

export interface CtfSession {
  id: string;
  /** True when the request carried no cookie and the response must set one. */
  isNew: boolean;
}

export function loginClaimKey(ip: string, username: string): string {
  return `login:${ip}:${username}`;
}

export function sessionClaimKey(sid: string): string {
  return `session:${sid}`;
}

export function getCtfSession(request: NextRequest): CtfSession {
  const existing = request.cookies.get(SESSION_COOKIE)?.value;
  if (existing && /^[A-Za-z0-9-]{8,64}$/.test(existing)) return { id: existing, isNew: false };
  return { id: randomUUID(), isNew: true };
}

export function sessionCookieHeader(session: CtfSession): Record<string, string> {
  if (!session.isNew) return {};
  const maxAge = Math.floor(SESSION_DISCOVERY_TTL_MS / 1000);
  return {
    "Set-Cookie": `${SESSION_COOKIE}=${session.id}; Path=/; HttpOnly; SameSite=Lax; Max-Age=${maxAge}`,
  };
}

export async function recordPendingDiscovery(
  db: DbAdapter,
  claimKey: string,
  slug: BugSlug,
  details: Record<string, unknown>,
  ttlMs: number,
  now: Date = new Date()
): Promise<void> {
  await db.upsertPendingDiscovery({
    claim_key: claimKey,
    bug_slug: slug,
    details: { ...details, recorded_at: now.toISOString() },
    expires_at: new Date(now.getTime() + ttlMs).toISOString(),
  });
}

export interface ClaimedDiscovery {
  slug: BugSlug;
  details: Record<string, unknown>;
}

function parseDetails(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (err) {
    console.warn("[ctf] unreadable pending discovery details:", err);
  }
  return {};
}

/**
 * Take at most one pending discovery for a freshly signed-in player:
 * the brute-force one for this ip and username, else the first reset-link
 * find of the session in catalogue order. The claimed row is deleted.
 */
export async function claimPendingDiscovery(
  db: DbAdapter,
  keys: { ip: string; username: string; sessionId: string | null },
  now: Date = new Date()
): Promise<ClaimedDiscovery | null> {
  const nowIso = now.toISOString();
  await db.purgeExpiredPendingDiscoveries(nowIso);

  const loginRows = await db.listPendingDiscoveries(loginClaimKey(keys.ip, keys.username), nowIso);
  const loginRow = loginRows.find((r) => r.bug_slug === "login-rate-limit");
  if (loginRow) {
    await db.deletePendingDiscovery(loginRow.id);
    return { slug: "login-rate-limit", details: parseDetails(loginRow.details) };
  }

  if (!keys.sessionId) return null;
  const sessionRows = await db.listPendingDiscoveries(sessionClaimKey(keys.sessionId), nowIso);
  for (const slug of RESET_BUG_SLUGS) {
    const row = sessionRows.find((r) => r.bug_slug === slug);
    if (row) {
      await db.deletePendingDiscovery(row.id);
      return { slug, details: parseDetails(row.details) };
    }
  }
  return null;
}
