import { describe, it, expect, vi } from "vitest";
import { SSE_PING, chatStreamFrame, parseChatFrame, readChatStream, type ChatStreamEvent } from "@/lib/api/sse";
import type { MessageView } from "@/lib/serializers";

function streamOf(chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream({
    start(controller) {
      for (const c of chunks) controller.enqueue(encoder.encode(c));
      controller.close();
    },
  });
}

async function collect(stream: ReadableStream<Uint8Array> | null): Promise<ChatStreamEvent[]> {
  const events: ChatStreamEvent[] = [];
  for await (const ev of readChatStream(stream)) events.push(ev);
  return events;
}

const hello: MessageView = {
  id: 2,
  thread_id: 1,
  sender: { id: 7, username: "alice", profile_picture: null },
  text: "hello",
  created_at: "2026-01-01T00:00:00.000Z",
};

describe("chatStreamFrame", () => {
  it("formats one event frame", () => {
    expect(chatStreamFrame({ event: "ready", data: { thread_id: 1, user_id: 7 } })).toBe(
      'event: ready\ndata: {"thread_id":1,"user_id":7}\n\n'
    );
  });
});

describe("parseChatFrame", () => {
  it("ignores ping comments", () => {
    expect(parseChatFrame(SSE_PING.trim())).toBeNull();
  });

  it("drops a message whose payload is not a message", () => {
    expect(parseChatFrame('event: message\ndata: {"id":"2"}')).toBeNull();
  });

  it("drops unknown event names", () => {
    expect(parseChatFrame('event: typing\ndata: {"thread_id":1,"user_id":7}')).toBeNull();
  });
});

describe("readChatStream", () => {
  it("parses frames split across chunks and skips pings", async () => {
    const text =
      chatStreamFrame({ event: "ready", data: { thread_id: 1, user_id: 7 } }) +
      SSE_PING +
      chatStreamFrame({ event: "message", data: hello });
    const events = await collect(streamOf([text.slice(0, 10), text.slice(10, 45), text.slice(45)]));
    expect(events).toEqual([
      { event: "ready", data: { thread_id: 1, user_id: 7 } },
      { event: "message", data: hello },
    ]);
  });

  it("skips frames with unparseable data", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const events = await collect(
      streamOf(["event: message\ndata: {nope\n\n", chatStreamFrame({ event: "message", data: hello })])
    );
    expect(events).toEqual([{ event: "message", data: hello }]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("yields nothing for a null stream", async () => {
    expect(await collect(null)).toEqual([]);
  });
});
