import { NextRequest } from "next/server";
import { getDb } from "@/lib/db";
import { json, validationError, internalError } from "@/lib/api/response-helpers";
import { fieldErrors, userSearchSchema } from "@/lib/validation/request-schema";
import { getRequestUser } from "@/lib/auth/request-user";
import { userSummary } from "@/lib/serializers";

const SEARCH_LIMIT = 10;

export async function GET(request: NextRequest) {
  try {
    const parsed = userSearchSchema.safeParse({
      search: request.nextUrl.searchParams.get("search") ?? "",
    });
    if (!parsed.success) {
      return validationError("Search query is required.", fieldErrors(parsed.error));
    }

    const db = getDb();
    const caller = await getRequestUser(request, db);
    const query = parsed.data.search;
    const rows = await db.searchUsers(query, caller?.id ?? null, SEARCH_LIMIT);
    const origin = request.nextUrl.origin;

    return json({
      results: rows.map((r) => userSummary(origin, r)),
      count: rows.length,
      search_query: query,
      message: `Found ${rows.length} users matching "${query}"`,
    });
  } catch (err) {
    console.error("GET /api/users error:", err);
    return internalError();
  }
}
