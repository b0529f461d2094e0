import { getDb } from "@/lib/db";
import { json, internalError } from "@/lib/api/response-helpers";

export async function GET() {
  try {
    const totals = await getDb().getTotals();
    return json(totals);
  } catch (err) {
    console.error("GET /api/stats/summary error:", err);
    return internalError();
  }
}
