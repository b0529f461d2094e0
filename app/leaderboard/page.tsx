'use client';

import { Trophy } from 'lucide-react';
import { useLeaderboard } from '@/lib/hooks';

export default function LeaderboardPage() {
  const { data, loading, error } = useLeaderboard();

  if (loading && !data) return <p className="text-sm text-muted-foreground">Loading…</p>;
  if (error) return <p className="text-sm text-red-600">{error}</p>;

  return (
    <div>
      <h1 className="mb-4 inline-flex items-center gap-2 text-xl font-semibold">
        <Trophy className="h-5 w-5 text-amber-500" /> Leaderboard
      </h1>
      <table className="w-full text-sm">
        <thead className="text-left text-xs uppercase text-muted-foreground">
          <tr>
            <th className="py-2">#</th>
            <th>Player</th>
            <th className="text-right">Bugs</th>
            <th className="text-right">Points</th>
          </tr>
        </thead>
        <tbody>
          {data?.map((row) => (
            <tr key={row.user_id} className="border-t border-border">
              <td className="py-2">{row.rank}</td>
              <td>{row.username}</td>
              <td className="text-right">{row.bugs_solved}</td>
              <td className="text-right font-medium">{row.points}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}
