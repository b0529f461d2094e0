"use client";

import { useState, useCallback, useEffect } from "react";
import { apiFetch } from "@/lib/api-client";

export interface LeaderboardEntry {
  rank: number;
  user_id: number;
  username: string;
  points: number;
  bugs_solved: number;
}

export interface UseLeaderboardResult {
  data: LeaderboardEntry[] | null;
  loading: boolean;
  error: string | null;
  refetch: () => Promise<void>;
}

export function useLeaderboard(): UseLeaderboardResult {
  const [data, setData] = useState<LeaderboardEntry[] | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const refetch = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      const body = await apiFetch<{ results: LeaderboardEntry[] }>("/api/ctf/leaderboard", {
        cache: "no-store",
      });
      setData(body.results);
    } catch {
      setError("Failed to load leaderboard");
      setData(null);
    } finally {
      setLoading(false);
    }
  }, []);

  useEffect(() => {
    void refetch();
  }, [refetch]);

  return { data, loading, error, refetch };
}
