import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, notFoundError, validationError, internalError } from "@/lib/api/response-helpers";
import { readBody } from "@/lib/api/read-body";
import { fieldErrors, forgotPasswordSchema } from "@/lib/validation/request-schema";
import { getPublicBaseUrl } from "@/lib/config/settings";
import { buildResetLink } from "@/lib/ctf/reset-token";

export async function POST(request: NextRequest) {
  try {
    const parsed = forgotPasswordSchema.safeParse(await readBody(request));
    if (!parsed.success) {
      return validationError("Email is required.", fieldErrors(parsed.error));
    }

    const db = getDb();
    const user = await db.getUserByEmail(parsed.data.email);
    if (!user) return notFoundError("No user found with this email address.");

    // There is no mail transport: the server console is the inbox.
    const link = buildResetLink(getPublicBaseUrl(), user.username);
    console.log(`Password reset link for ${user.username} <${user.email}>: ${link.url}`);

    return json({ message: "Password reset link sent! Check console." });
  } catch (err) {
    console.error("POST /api/auth/forgot-password error:", err);
    return internalError();
  }
}
