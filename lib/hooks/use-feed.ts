"use client";

import { useState, useCallback, useEffect } from "react";
import { apiFetch, ApiRequestError } from "@/lib/api-client";
import type { PostView } from "@/lib/serializers";

interface FeedResponse {
  results: PostView[];
  count: number;
  message?: string;
}

export interface UseFeedResult {
  posts: PostView[];
  /** Server hint shown when the user follows nobody yet. */
  message: string | null;
  loading: boolean;
  error: string | null;
  refetch: () => Promise<void>;
  /** Replace one post in place after a like/save. */
  updatePost: (postId: number, patch: Partial<PostView>) => void;
}

export function useFeed(): UseFeedResult {
  const [posts, setPosts] = useState<PostView[]>([]);
  const [message, setMessage] = useState<string | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const refetch = useCallback(async () => {
    setLoading(true);
    setError(null);
    try {
      const data = await apiFetch<FeedResponse>("/api/feed", { cache: "no-store" });
      setPosts(data.results);
      setMessage(data.message ?? null);
    } catch (err) {
      setError(
        err instanceof ApiRequestError && err.status === 401
          ? "Sign in to see your feed"
          : "Failed to load feed"
      );
      setPosts([]);
    } finally {
      setLoading(false);
    }
  }, []);

  const updatePost = useCallback((postId: number, patch: Partial<PostView>) => {
    setPosts((prev) => prev.map((p) => (p.id === postId ? { ...p, ...patch } : p)));
  }, []);

  useEffect(() => {
    void refetch();
  }, [refetch]);

  return { posts, message, loading, error, refetch, updatePost };
}
