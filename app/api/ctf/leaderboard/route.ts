import { getDb } from "@/lib/db";
import { json, internalError } from "@/lib/api/response-helpers";

const LEADERBOARD_SIZE = 50;

export async function GET() {
  try {
    const rows = await getDb().listLeaderboard(LEADERBOARD_SIZE);
    return json({
      results: rows.map((row, i) => ({
        rank: i + 1,
        user_id: row.id,
        username: row.username,
        points: row.points,
        bugs_solved: row.bugs_solved,
      })),
    });
  } catch (err) {
    console.error("GET /api/ctf/leaderboard error:", err);
    return internalError();
  }
}
