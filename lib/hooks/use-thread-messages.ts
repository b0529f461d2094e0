"use client";

import { useState, useCallback, useEffect } from "react";
import { apiFetch, getStoredToken } from "@/lib/api-client";
import { readChatStream } from "@/lib/api/sse";
import type { MessageView } from "@/lib/serializers";

export interface UseThreadMessagesResult {
  messages: MessageView[];
  loading: boolean;
  error: string | null;
  /** True while the live stream is open. */
  live: boolean;
  send: (text: string) => Promise<boolean>;
}

/** Union by id, oldest first. */
function mergeMessages(current: MessageView[], incoming: MessageView[]): MessageView[] {
  const byId = new Map(current.map((m) => [m.id, m]));
  for (const m of incoming) byId.set(m.id, m);
  return [...byId.values()].sort((a, b) => a.id - b.id);
}

/**
 * Follows a thread's SSE stream and loads its history once the stream is
 * subscribed, so nothing published in between is missed. A sent message
 * arrives both in the POST response and on the stream; ids dedupe them.
 */
export function useThreadMessages(threadId: number | undefined): UseThreadMessagesResult {
  const [messages, setMessages] = useState<MessageView[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [live, setLive] = useState(false);

  useEffect(() => {
    setMessages([]);
    if (threadId === undefined) return;
    const controller = new AbortController();

    const loadHistory = async () => {
      try {
        const history = await apiFetch<MessageView[]>(`/api/messages/threads/${threadId}`, {
          signal: controller.signal,
        });
        setMessages((prev) => mergeMessages(prev, history));
      } catch (err) {
        if (controller.signal.aborted) return;
        setError(err instanceof Error ? err.message : "Failed to load messages");
      } finally {
        setLoading(false);
      }
    };

    const run = async () => {
      setLoading(true);
      setError(null);

      const token = getStoredToken() ?? "";
      const res = await fetch(
        `/api/messages/threads/${threadId}/stream?token=${encodeURIComponent(token)}`,
        { signal: controller.signal }
      );
      if (!res.ok) {
        await loadHistory();
        setError((prev) => prev ?? "Live updates unavailable");
        return;
      }
      for await (const ev of readChatStream(res.body)) {
        if (ev.event === "ready") {
          setLive(true);
          void loadHistory();
        } else {
          const incoming = ev.data;
          setMessages((prev) => mergeMessages(prev, [incoming]));
        }
      }
      setLive(false);
    };

    run().catch((err: unknown) => {
      setLive(false);
      setLoading(false);
      if (!controller.signal.aborted) {
        console.error("[chat] stream failed:", err);
        setError("Live updates interrupted");
      }
    });

    return () => controller.abort();
  }, [threadId]);

  const send = useCallback(
    async (text: string) => {
      if (threadId === undefined) return false;
      try {
        const message = await apiFetch<MessageView>(`/api/messages/threads/${threadId}`, {
          method: "POST",
          body: JSON.stringify({ text }),
        });
        setMessages((prev) => mergeMessages(prev, [message]));
        return true;
      } catch (err) {
        setError(err instanceof Error ? err.message : "Failed to send message");
        return false;
      }
    },
    [threadId]
  );

  return { messages, loading, error, live, send };
}
