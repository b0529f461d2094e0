import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, validationError, internalError } from "@/lib/api/response-helpers";
import { readBody } from "@/lib/api/read-body";
import { fieldErrors, registerSchema } from "@/lib/validation/request-schema";
import { hashPassword } from "@/lib/auth/password";
import { getOrCreateToken } from "@/lib/auth/tokens";

export async function POST(request: NextRequest) {
  try {
    const parsed = registerSchema.safeParse(await readBody(request));
    if (!parsed.success) {
      return validationError("Invalid request body", fieldErrors(parsed.error));
    }

    const { username, email, password } = parsed.data;
    const db = getDb();

    if (await db.getUserByUsername(username)) {
      return validationError("Username already exists.", { username: ["Username already exists."] });
    }
    if (await db.getUserByEmail(email)) {
      return validationError("Email already exists.", { email: ["Email already exists."] });
    }

    const user = await db.insertUser({
      username,
      email,
      password_hash: await hashPassword(password),
    });
    const token = await getOrCreateToken(db, user.id);

    return json(
      {
        message: "User created successfully.",
        token,
        user_id: user.id,
        username: user.username,
        email: user.email,
      },
      201
    );
  } catch (err) {
    console.error("POST /api/auth/register error:", err);
    return internalError();
  }
}
