/**
 * In-process publish/subscribe for chat. Each thread is a group named
 * `chat_<threadId>`; SSE streams subscribe and the message route publishes.
 * Single-process only: a multi-instance deployment would need a shared broker.
 */

import { EventEmitter } from "events";
import type { MessageView } from "@/lib/serializers";

export function chatGroup(threadId: number): string {
  return `chat_${threadId}`;
}

export type ChatListener = (message: MessageView) => void;

class ChatHub {
  private emitter = new EventEmitter();

  constructor() {
    // One listener per open stream; the default cap of 10 is too low.
    this.emitter.setMaxListeners(0);
  }

  publish(threadId: number, message: MessageView): void {
    this.emitter.emit(chatGroup(threadId), message);
  }

  /** Returns the unsubscribe function. */
  subscribe(threadId: number, listener: ChatListener): () => void {
    const group = chatGroup(threadId);
    this.emitter.on(group, listener);
    return () => {
      this.emitter.off(group, listener);
    };
  }

  listenerCount(threadId: number): number {
    return this.emitter.listenerCount(chatGroup(threadId));
  }
}

export const chatHub = new ChatHub();
