// @vitest-environment jsdom
import { renderHook, waitFor } from "@testing-library/react";
import { useThreadMessages } from "@/lib/hooks/use-thread-messages";
import { setStoredToken } from "@/lib/api-client";
import { chatStreamFrame } from "@/lib/api/sse";
import type { MessageView } from "@/lib/serializers";

function message(id: number, text: string): MessageView {
  return {
    id,
    thread_id: 4,
    sender: { id: 1, username: "alice", profile_picture: null },
    text,
    created_at: "2025-03-01T12:00:00.000Z",
  };
}

function streamResponse(frames: string): Response {
  const encoder = new TextEncoder();
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(encoder.encode(frames));
      controller.close();
    },
  });
  return new Response(body, { status: 200, headers: { "Content-Type": "text/event-stream" } });
}

function stubFetch(stream: () => Response, history: MessageView[]) {
  const fetchMock = vi.fn(async (input: RequestInfo | URL, _init?: RequestInit) =>
    String(input).includes("/stream") ? stream() : new Response(JSON.stringify(history), { status: 200 })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("useThreadMessages", () => {
  beforeEach(() => {
    setStoredToken("test-token");
  });

  afterEach(() => {
    setStoredToken(null);
    vi.unstubAllGlobals();
  });

  it("subscribes before loading history and keeps messages published in between", async () => {
    const fetchMock = stubFetch(
      () =>
        streamResponse(
          chatStreamFrame({ event: "ready", data: { thread_id: 4, user_id: 2 } }) +
            chatStreamFrame({ event: "message", data: message(2, "while loading") })
        ),
      [message(1, "earlier")]
    );
    const { result } = renderHook(() => useThreadMessages(4));

    await waitFor(() => expect(result.current.messages.map((m) => m.id)).toEqual([1, 2]));
    expect(result.current.loading).toBe(false);
    expect(result.current.error).toBeNull();

    expect(fetchMock.mock.calls.map((c) => String(c[0]))).toEqual([
      "/api/messages/threads/4/stream?token=test-token",
      "/api/messages/threads/4",
    ]);
  });

  it("still shows history when the stream is refused", async () => {
    stubFetch(
      () => new Response(JSON.stringify({ error: "forbidden", message: "Access denied." }), { status: 403 }),
      [message(1, "earlier")]
    );
    const { result } = renderHook(() => useThreadMessages(4));

    await waitFor(() => expect(result.current.error).toBe("Live updates unavailable"));
    expect(result.current.messages.map((m) => m.text)).toEqual(["earlier"]);
    expect(result.current.live).toBe(false);
  });
});
