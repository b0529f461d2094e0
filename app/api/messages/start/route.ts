import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import {
  json,
  notFoundError,
  unauthorizedError,
  validationError,
  internalError,
} from "@/lib/api/response-helpers";
import { readBody } from "@/lib/api/read-body";
import { fieldErrors, startThreadSchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { loadThreadView } from "@/lib/messages/load-thread";

export async function POST(request: NextRequest) {
  try {
    const db = getDb();
    const user = await getRequestUser(request, db);
    if (!user) return unauthorizedError();

    const parsed = startThreadSchema.safeParse(await readBody(request));
    if (!parsed.success) {
      return validationError("receiver_id is required.", fieldErrors(parsed.error));
    }
    const { receiver_id } = parsed.data;

    const receiver = await db.getUserById(receiver_id);
    if (!receiver) return notFoundError("User not found.");
    if (receiver.id === user.id) {
      return validationError("Cannot start thread with yourself.");
    }

    const thread =
      (await db.findThreadBetween(user.id, receiver.id)) ??
      (await db.insertThread([user.id, receiver.id]));

    return json(await loadThreadView(db, request.nextUrl.origin, thread), 201);
  } catch (err) {
    console.error("POST /api/messages/start error:", err);
    return internalError();
  }
}
