/**
 * Server-Sent Events for a chat thread: the frames the stream route writes
 * and the typed events the thread view reads back out of them.
 */

import type { MessageView } from "@/lib/serializers";

export interface ChatReadyEvent {
  event: "ready";
  data: { thread_id: number; user_id: number };
}

export interface ChatMessageEvent {
  event: "message";
  data: MessageView;
}

export type ChatStreamEvent = ChatReadyEvent | ChatMessageEvent;

/** Comment frame sent on idle streams so proxies keep the connection open. */
export const SSE_PING = ": ping\n\n";

export function chatStreamFrame({ event, data }: ChatStreamEvent): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isMessageView(value: unknown): value is MessageView {
  return (
    isRecord(value) &&
    typeof value.id === "number" &&
    typeof value.thread_id === "number" &&
    typeof value.text === "string" &&
    isRecord(value.sender)
  );
}

function isReadyData(value: unknown): value is ChatReadyEvent["data"] {
  return isRecord(value) && typeof value.thread_id === "number" && typeof value.user_id === "number";
}

/**
 * One frame as a chat event. Comments (pings), unknown event names and
 * payloads of the wrong shape give null.
 */
export function parseChatFrame(frame: string): ChatStreamEvent | null {
  let event = "";
  const dataLines: string[] = [];
  for (const line of frame.split(/\r?\n/)) {
    if (line.startsWith(":")) continue;
    if (line.startsWith("event:")) event = line.slice(6).trim();
    else if (line.startsWith("data:")) dataLines.push(line.slice(5).replace(/^ /, ""));
  }
  if (dataLines.length === 0) return null;

  let payload: unknown;
  try {
    payload = JSON.parse(dataLines.join("\n"));
  } catch (err) {
    console.warn("[chat] dropping malformed frame:", err);
    return null;
  }
  if (event === "ready" && isReadyData(payload)) return { event: "ready", data: payload };
  if (event === "message" && isMessageView(payload)) return { event: "message", data: payload };
  return null;
}

/** Yields chat events from a stream body as frames arrive. */
export async function* readChatStream(
  stream: ReadableStream<Uint8Array> | null,
): AsyncGenerator<ChatStreamEvent> {
  if (!stream) return;
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      const frames = buffer.split(/\r?\n\r?\n/);
      buffer = frames.pop() ?? "";
      for (const frame of frames) {
        const ev = parseChatFrame(frame);
        if (ev) yield ev;
      }
    }
    const tail = parseChatFrame(buffer);
    if (tail) yield tail;
  } finally {
    reader.releaseLock();
  }
}
