import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { isCtfEnabled } from "@/lib/feature-flags";
import {
  json,
  forbiddenError,
  unauthorizedError,
  validationError,
  internalError,
} from "@/lib/api/response-helpers";
import { readBody } from "@/lib/api/read-body";
import { setRoleSchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { awardBug, awardFields } from "@/lib/ctf/award-bug";

const ELEVATED_ROLES = new Set(["admin", "administrator", "moderator", "staff", "superuser"]);

/** Confirms the endpoint is reachable for a signed-in user. */
export async function GET(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    return json({
      message: "Role endpoint is accessible",
      user: user.username,
      methods_allowed: ["GET", "POST"],
    });
  } catch (err) {
    console.error("GET /api/users/set-role error:", err);
    return internalError();
  }
}

/**
 * Looks like it lets any user raise their own role. It never changes anything:
 * an elevated role request is recorded as a privilege-escalation find.
 */
export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();
    if (!isCtfEnabled()) return forbiddenError("Role changes are not allowed.");

    const parsed = setRoleSchema.safeParse(await readBody(request));
    const role = parsed.success ? parsed.data.role.trim().toLowerCase() : "";
    console.warn(`[ctf] user ${user.id} asked for role "${role}"`);

    if (!ELEVATED_ROLES.has(role)) {
      return validationError("Invalid role specified. Valid roles: admin, moderator, staff", {
        role: ["Role must be one of: admin, moderator, staff"],
      });
    }

    const award = await awardBug(db, user.id, "privilege-escalation");
    return json({
      ...awardFields(award),
      message: award.success
        ? "CTF Challenge: Privilege Escalation Vulnerability Found!"
        : "CTF Challenge: You already found this vulnerability!",
      description: `You attempted to escalate to ${role} - this would be dangerous in a real system!`,
      actual_user_role: "user",
      attempted_role: role,
      user_id: user.id,
      username: user.username,
    });
  } catch (err) {
    console.error("POST /api/users/set-role error:", err);
    return internalError();
  }
}
