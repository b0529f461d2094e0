import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { NextRequest } from "next/server";
import { resetDbForTesting } from "@/lib/db";
import type { DbAdapter } from "@/lib/db/adapter";
import { readChatStream } from "@/lib/api/sse";
import { chatHub } from "@/lib/realtime/chat-hub";
import { GET as listThreads } from "@/app/api/messages/threads/route";
import { POST as start } from "@/app/api/messages/start/route";
import { GET as readThread, POST as postMessage } from "@/app/api/messages/threads/[threadId]/route";
import { POST as accept } from "@/app/api/messages/threads/[threadId]/accept/route";
import { GET as stream } from "@/app/api/messages/threads/[threadId]/stream/route";
import { GET as idorRead } from "@/app/api/ctf/messages/threads/[threadId]/route";
import { GET as debugThreads } from "@/app/api/ctf/debug/threads/route";
import { BASE, createUser, makeRequest, params, readJson, type TestUser } from "../lib/api-helpers";

describe("message routes", () => {
  let db: DbAdapter;
  let alice: TestUser;
  let bob: TestUser;
  let mallory: TestUser;

  beforeEach(async () => {
    db = resetDbForTesting();
    alice = await createUser(db, "alice");
    bob = await createUser(db, "bob");
    mallory = await createUser(db, "mallory");
  });

  const thread = (id: number) => params({ threadId: String(id) });

  async function startThread(from: TestUser, to: TestUser): Promise<number> {
    const res = await start(makeRequest("/api/messages/start", { token: from.token, json: { receiver_id: to.user.id } }));
    return Number((await readJson(res)).id);
  }

  async function acceptedThread(): Promise<number> {
    const id = await startThread(alice, bob);
    await accept(makeRequest(`/api/messages/threads/${id}/accept`, { method: "POST", token: bob.token }), thread(id));
    return id;
  }

  const send = (user: TestUser, id: number, text: string) =>
    postMessage(makeRequest(`/api/messages/threads/${id}`, { token: user.token, json: { text } }), thread(id));

  describe("start", () => {
    it("creates one pending thread per pair", async () => {
      const first = await startThread(alice, bob);
      const second = await startThread(bob, alice);
      expect(second).toBe(first);

      const res = await start(makeRequest("/api/messages/start", { token: alice.token, json: { receiver_id: bob.user.id } }));
      expect(res.status).toBe(201);
      expect(await readJson(res)).toMatchObject({ id: first, is_accepted: false, last_message: null });
    });

    it("refuses a thread with yourself", async () => {
      const res = await start(makeRequest("/api/messages/start", { token: alice.token, json: { receiver_id: alice.user.id } }));
      expect(res.status).toBe(400);
      expect((await readJson(res)).message).toBe("Cannot start thread with yourself.");
    });

    it("requires receiver_id", async () => {
      const res = await start(makeRequest("/api/messages/start", { token: alice.token, json: {} }));
      expect(res.status).toBe(400);
      expect((await readJson(res)).details).toEqual({ receiver_id: ["receiver_id is required."] });
    });

    it("404s for an unknown receiver", async () => {
      const res = await start(makeRequest("/api/messages/start", { token: alice.token, json: { receiver_id: 999 } }));
      expect(res.status).toBe(404);
    });
  });

  describe("threads", () => {
    it("keeps pending threads under requests until accepted", async () => {
      await startThread(alice, bob);
      const before = await readJson(await listThreads(makeRequest("/api/messages/threads", { token: bob.token })));
      expect(before.inbox).toEqual([]);
      expect(before.requests).toHaveLength(1);

      await acceptedThread();
      const after = await readJson(await listThreads(makeRequest("/api/messages/threads", { token: bob.token })));
      expect(after.inbox).toHaveLength(1);
      expect(after.requests).toEqual([]);
    });

    it("refuses messages before acceptance", async () => {
      const id = await startThread(alice, bob);
      const res = await send(alice, id, "hi");
      expect(res.status).toBe(400);
      expect((await readJson(res)).message).toBe("Thread not accepted yet.");
    });

    it("posts and reads messages in order", async () => {
      const id = await acceptedThread();
      expect((await send(alice, id, "hi bob")).status).toBe(201);
      await send(bob, id, "hi alice");

      const res = await readThread(makeRequest(`/api/messages/threads/${id}`, { token: bob.token }), thread(id));
      expect(await readJson(res)).toMatchObject([
        { text: "hi bob", sender: { username: "alice" } },
        { text: "hi alice", sender: { username: "bob" } },
      ]);
    });

    it("shows the last message in the thread list", async () => {
      const id = await acceptedThread();
      await send(alice, id, "latest");
      const body = await readJson(await listThreads(makeRequest("/api/messages/threads", { token: alice.token })));
      expect(body.inbox).toMatchObject([{ id, last_message: { text: "latest" } }]);
    });

    it("rejects outsiders", async () => {
      const id = await acceptedThread();
      const res = await readThread(makeRequest(`/api/messages/threads/${id}`, { token: mallory.token }), thread(id));
      expect(res.status).toBe(403);

      const post = await send(mallory, id, "let me in");
      expect(post.status).toBe(404);
      expect((await readJson(post)).message).toBe("Thread not found or access denied.");
    });
  });

  describe("stream", () => {
    it("emits ready, then published messages, and unsubscribes on cancel", async () => {
      const id = await acceptedThread();
      const res = await stream(makeRequest(`/api/messages/threads/${id}/stream?token=${bob.token}`), thread(id));
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/event-stream");
      expect(chatHub.listenerCount(id)).toBe(1);

      const body = res.body;
      if (!body) throw new Error("expected a stream body");
      const events = readChatStream(body);

      const ready = await events.next();
      expect(ready.value).toEqual({ event: "ready", data: { thread_id: id, user_id: bob.user.id } });

      await send(alice, id, "live");
      const message = await events.next();
      expect(message.value).toMatchObject({ event: "message", data: { thread_id: id, text: "live" } });

      await events.return(undefined);
      await body.cancel();
      expect(chatHub.listenerCount(id)).toBe(0);
    });

    it("does not subscribe when the client is already gone", async () => {
      const id = await acceptedThread();
      const gone = new AbortController();
      gone.abort();
      const res = await stream(
        new NextRequest(`${BASE}/api/messages/threads/${id}/stream?token=${bob.token}`, { signal: gone.signal }),
        thread(id)
      );
      expect(chatHub.listenerCount(id)).toBe(0);

      const body = res.body;
      if (!body) throw new Error("expected a stream body");
      expect((await body.getReader().read()).done).toBe(true);
    });

    describe("keep-alive", () => {
      beforeEach(() => {
        vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
      });

      afterEach(() => {
        vi.useRealTimers();
      });

      it("sends a ping comment while idle and stops on cancel", async () => {
        const id = await acceptedThread();
        const res = await stream(makeRequest(`/api/messages/threads/${id}/stream?token=${bob.token}`), thread(id));
        const body = res.body;
        if (!body) throw new Error("expected a stream body");
        const reader = body.getReader();
        const decoder = new TextDecoder();

        await reader.read(); // ready
        vi.advanceTimersByTime(25_000);
        const ping = await reader.read();
        expect(decoder.decode(ping.value)).toBe(": ping\n\n");

        await reader.cancel();
        expect(vi.getTimerCount()).toBe(0);
        expect(chatHub.listenerCount(id)).toBe(0);
      });
    });

    it("maps access failures to status codes", async () => {
      const id = await acceptedThread();
      const anonymous = await stream(makeRequest(`/api/messages/threads/${id}/stream`), thread(id));
      expect(anonymous.status).toBe(401);
      expect((await readJson(anonymous)).message).toBe("Invalid or missing token.");

      const outsider = await stream(makeRequest(`/api/messages/threads/${id}/stream?token=${mallory.token}`), thread(id));
      expect(outsider.status).toBe(403);

      const missing = await stream(makeRequest(`/api/messages/threads/999/stream?token=${bob.token}`), thread(999));
      expect(missing.status).toBe(404);
    });
  });

  describe("ctf", () => {
    it("scores reading someone else's thread", async () => {
      const id = await acceptedThread();
      const res = await idorRead(makeRequest(`/api/ctf/messages/threads/${id}`, { token: mallory.token }), thread(id));
      expect(await readJson(res)).toMatchObject({
        vulnerability_detected: true,
        ctf_points_awarded: 75,
        flag: `CTF{idor_chat_messages_${mallory.user.id}}`,
        thread_id: id,
        participant_check_bypassed: true,
        bug_type: "IDOR (Insecure Direct Object Reference)",
      });
    });

    it("returns messages to participants", async () => {
      const id = await acceptedThread();
      await send(alice, id, "hello");
      const res = await idorRead(makeRequest(`/api/ctf/messages/threads/${id}`, { token: bob.token }), thread(id));
      expect(await readJson(res)).toMatchObject([{ text: "hello" }]);
    });

    it("lists every thread on the debug endpoint", async () => {
      const id = await acceptedThread();
      await send(alice, id, "hello");
      const body = await readJson(await debugThreads(makeRequest("/api/ctf/debug/threads", { token: mallory.token })));
      expect(body).toMatchObject({
        total_threads: 1,
        threads: [
          {
            id,
            participants: [
              { id: alice.user.id, username: "alice" },
              { id: bob.user.id, username: "bob" },
            ],
            is_accepted: true,
            message_count: 1,
          },
        ],
        current_user_id: mallory.user.id,
        current_username: "mallory",
      });
    });
  });
});
