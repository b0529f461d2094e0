"use client";

import { useState, useCallback, useEffect } from "react";
import { apiFetch } from "@/lib/api-client";
import type { ThreadView } from "@/lib/serializers";

export interface ThreadLists {
  inbox: ThreadView[];
  requests: ThreadView[];
}

export interface UseThreadsResult {
  data: ThreadLists | null;
  loading: boolean;
  error: string | null;
  refetch: () => Promise<void>;
  accept: (threadId: number) => Promise<boolean>;
}

export function useThreads(): UseThreadsResult {
  const [data, setData] = useState<ThreadLists | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const refetch = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      setData(await apiFetch<ThreadLists>("/api/messages/threads", { cache: "no-store" }));
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to load threads");
      setData(null);
    } finally {
      setLoading(false);
    }
  }, []);

  const accept = useCallback(
    async (threadId: number) => {
      try {
        await apiFetch(`/api/messages/threads/${threadId}/accept`, { method: "POST" });
        await refetch();
        return true;
      } catch (err) {
        setError(err instanceof Error ? err.message : "Failed to accept chat request");
        return false;
      }
    },
    [refetch]
  );

  useEffect(() => {
    void refetch();
  }, [refetch]);

  return { data, loading, error, refetch, accept };
}
