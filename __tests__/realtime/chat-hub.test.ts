import { describe, it, expect, vi } from "vitest";
import { chatGroup, chatHub } from "@/lib/realtime/chat-hub";
import type { MessageView } from "@/lib/serializers";

const message: MessageView = {
  id: 1,
  thread_id: 5,
  sender: { id: 1, username: "alice", profile_picture: null },
  text: "hi",
  created_at: "2025-03-01T12:00:00.000Z",
};

describe("chatHub", () => {
  it("names groups after the thread", () => {
    expect(chatGroup(5)).toBe("chat_5");
  });

  it("delivers to subscribers of the same thread only", () => {
    const onFive = vi.fn();
    const onSix = vi.fn();
    const offFive = chatHub.subscribe(5, onFive);
    const offSix = chatHub.subscribe(6, onSix);

    chatHub.publish(5, message);

    expect(onFive).toHaveBeenCalledWith(message);
    expect(onSix).not.toHaveBeenCalled();
    offFive();
    offSix();
  });

  it("stops delivering after unsubscribe", () => {
    const listener = vi.fn();
    const off = chatHub.subscribe(7, listener);
    expect(chatHub.listenerCount(7)).toBe(1);
    off();
    expect(chatHub.listenerCount(7)).toBe(0);
    chatHub.publish(7, message);
    expect(listener).not.toHaveBeenCalled();
  });
});
