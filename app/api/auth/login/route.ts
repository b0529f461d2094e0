import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { isCtfEnabled } from "@/lib/feature-flags";
import { json, errorResponse, validationError, internalError } from "@/lib/api/response-helpers";
import { readBody } from "@/lib/api/read-body";
import { fieldErrors, loginSchema } from "@/lib/validation/request-schema";
import { verifyPassword } from "@/lib/auth/password";
import { getOrCreateToken } from "@/lib/auth/tokens";
import { clientIp } from "@/lib/auth/request-user";
import { LOGIN_FAILURE_THRESHOLD, loginFailures } from "@/lib/ctf/attempt-tracker";
import {
  LOGIN_DISCOVERY_TTL_MS,
  claimPendingDiscovery,
  getCtfSession,
  loginClaimKey,
  recordPendingDiscovery,
} from "@/lib/ctf/pending-discoveries";
import { awardBug, awardFields } from "@/lib/ctf/award-bug";
import { getBugDefinition } from "@/lib/ctf/catalogue";

export async function POST(request: NextRequest) {
  try {
    const parsed = loginSchema.safeParse(await readBody(request));
    if (!parsed.success) {
      return validationError("Username and password are required.", fieldErrors(parsed.error));
    }

    const { username, password } = parsed.data;
    const db = getDb();
    const ip = clientIp(request);
    const attemptKey = loginClaimKey(ip, username);

    const user = await db.getUserByUsername(username);
    const valid = user !== null && (await verifyPassword(password, user.password_hash));

    if (!user || !valid) {
      if (!isCtfEnabled()) return errorResponse("unauthorized", "Invalid credentials.");

      const failures = loginFailures.record(attemptKey);
      if (failures >= LOGIN_FAILURE_THRESHOLD) {
        await recordPendingDiscovery(
          db,
          attemptKey,
          "login-rate-limit",
          { target_username: username, failed_attempts_count: failures, client_ip: ip },
          LOGIN_DISCOVERY_TTL_MS
        );
        loginFailures.reset(attemptKey);
        console.warn(`[ctf] ${failures} failed logins for "${username}" from ${ip}`);
        return json(
          {
            error: "unauthorized",
            message: "Invalid credentials.",
            rate_limiting_bug_detected: true,
            ctf_message: `Rate limiting vulnerability detected! You made ${failures} failed login attempts.`,
            failed_attempts_count: failures,
            vulnerability_type: "Missing Rate Limiting",
            points_pending: getBugDefinition("login-rate-limit").points,
            security_hint: "Now login with correct credentials to claim your CTF points!",
          },
          401
        );
      }

      const remaining = Math.max(0, LOGIN_FAILURE_THRESHOLD - failures);
      return json(
        {
          error: "unauthorized",
          message: "Invalid credentials.",
          failed_attempts: failures,
          attempts_remaining: remaining,
          hint: `Login failed. ${remaining} attempts remaining before rate limiting should kick in.`,
        },
        401
      );
    }

    loginFailures.reset(attemptKey);
    const token = await getOrCreateToken(db, user.id);
    const body = { token, user_id: user.id, username: user.username, email: user.email };
    if (!isCtfEnabled()) return json(body);

    const session = getCtfSession(request);
    const claimed = await claimPendingDiscovery(db, {
      ip,
      username,
      sessionId: session.isNew ? null : session.id,
    });
    if (!claimed) return json(body);

    const award = await awardBug(db, user.id, claimed.slug);
    const def = getBugDefinition(claimed.slug);
    return json({
      ...body,
      ...awardFields(award),
      bug_type: def.title,
      description: def.description,
      target_username: claimed.details.target_username ?? null,
    });
  } catch (err) {
    console.error("POST /api/auth/login error:", err);
    return internalError();
  }
}
