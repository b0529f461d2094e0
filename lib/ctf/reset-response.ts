/**
 * Shared handling for a reset link that tripped one of the reset-token bugs.
 * Signed-in callers are awarded on the spot; anonymous callers get a
 * warning and a pending discovery tied to their ctf_session cookie.
 */

import type { NextRequest } from "next/server";
import type { DbAdapter } from "@/lib/db/adapter";
import type { UserRow } from "@/lib/db/types";
import { json } from "@/lib/api/response-helpers";
import { awardBug, awardFields } from "./award-bug";
import { getBugDefinition, type BugSlug } from "./catalogue";
import {
  SESSION_DISCOVERY_TTL_MS,
  getCtfSession,
  recordPendingDiscovery,
  sessionClaimKey,
  sessionCookieHeader,
} from "./pending-discoveries";

const WARNINGS: Partial<Record<BugSlug, string>> = {
  "reset-invalid-uid": "Invalid password reset link format detected. Please login to continue.",
  "reset-invalid-token": "Invalid password reset token format detected. Please login to continue.",
  "reset-malformed-token": "Malformed password reset token detected. Please login to continue.",
  "reset-invalid-base64":
    "Invalid base64 encoding detected in password reset token. Please login to continue.",
  "reset-predictable-token": "Predictable password reset token detected. Please login to continue.",
};

export interface ResetBug {
  slug: BugSlug;
  targetUsername: string | null;
  tokenUsername: string | null;
}

export async function respondToResetBug(
  request: NextRequest,
  db: DbAdapter,
  caller: UserRow | null,
  bug: ResetBug,
  mode: "verify" | "reset"
): Promise<Response> {
  const def = getBugDefinition(bug.slug);
  console.warn(`[ctf] tampered reset link: ${bug.slug} (${mode})`);

  if (caller) {
    const award = await awardBug(db, caller.id, bug.slug);
    return json({
      ...awardFields(award),
      bug_title: def.title,
      description: def.description,
      require_login: false,
    });
  }

  const session = getCtfSession(request);
  await recordPendingDiscovery(
    db,
    sessionClaimKey(session.id),
    bug.slug,
    {
      target_username: bug.targetUsername,
      token_username: bug.tokenUsername,
      attempted_exploit: `Submitted a reset link that triggers: ${def.title}`,
    },
    SESSION_DISCOVERY_TTL_MS
  );
  const headers = sessionCookieHeader(session);

  if (mode === "verify") {
    return json(
      {
        vulnerability_detected: true,
        notification_type: "warning",
        bug_title: def.title,
        warning_message: WARNINGS[bug.slug] ?? "Suspicious password reset link. Please login to continue.",
        require_login: true,
      },
      200,
      { headers }
    );
  }

  return json(
    {
      error: "validation_failed",
      message: "Invalid reset token. The token does not match the requested user.",
      vulnerability_detected: true,
      bug_title: def.title,
      points_pending: def.points,
      hint: "Vulnerability found! Log in to your account to claim the points.",
    },
    400,
    { headers }
  );
}
