/**
 * Post routes: upload, listing, visibility, like/save toggles and the two
 * post-related challenges (save race, private image).
 */

import { describe, it, expect, beforeEach } from "vitest";
import { resetDbForTesting } from "@/lib/db";
import type { DbAdapter } from "@/lib/db/adapter";
import { saveAttempts } from "@/lib/ctf/attempt-tracker";
import { GET as listPosts, POST as createPostRoute } from "@/app/api/posts/route";
import { GET as getPost, DELETE as deletePost } from "@/app/api/posts/[postId]/route";
import { POST as like } from "@/app/api/posts/[postId]/like/route";
import { POST as save } from "@/app/api/posts/[postId]/save/route";
import { GET as image } from "@/app/api/posts/[postId]/image/route";
import { GET as postComments } from "@/app/api/posts/[postId]/comments/route";
import { GET as feed } from "@/app/api/feed/route";
import { GET as notifications } from "@/app/api/notifications/route";
import {
  BASE,
  createPost,
  createUser,
  makeRequest,
  params,
  readJson,
  type TestUser,
} from "../lib/api-helpers";

function pngUpload(caption: string, isPrivate = false): FormData {
  const form = new FormData();
  form.append("image", new File([new Uint8Array([137, 80, 78, 71])], "shot.png", { type: "image/png" }));
  form.append("caption", caption);
  form.append("is_private", isPrivate ? "true" : "false");
  return form;
}

const post = (id: number) => params({ postId: String(id) });

describe("post routes", () => {
  let db: DbAdapter;
  let alice: TestUser;
  let bob: TestUser;

  beforeEach(async () => {
    db = resetDbForTesting();
    saveAttempts.clear();
    alice = await createUser(db, "alice");
    bob = await createUser(db, "bob");
  });

  describe("create", () => {
    it("stores the upload and returns the post", async () => {
      const res = await createPostRoute(
        makeRequest("/api/posts", { token: alice.token, form: pngUpload("sunset") })
      );
      expect(res.status).toBe(201);
      const body = await readJson(res);
      expect(body.caption).toBe("sunset");
      expect(body.is_private).toBe(false);
      expect(body.user).toEqual({ id: alice.user.id, username: "alice", profile_picture: null });
      expect(String(body.image)).toMatch(new RegExp(`^${BASE}/media/posts/[0-9a-f-]{36}\\.png$`));
    });

    it("serves the stored bytes to the owner", async () => {
      const created = await readJson(
        await createPostRoute(makeRequest("/api/posts", { token: alice.token, form: pngUpload("x", true) }))
      );
      const id = Number(created.id);
      const res = await image(makeRequest(`/api/posts/${id}/image`, { token: alice.token }), post(id));
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("image/png");
      expect(new Uint8Array(await res.arrayBuffer())).toEqual(new Uint8Array([137, 80, 78, 71]));
    });

    it("requires an image", async () => {
      const form = new FormData();
      form.append("caption", "no picture");
      const res = await createPostRoute(makeRequest("/api/posts", { token: alice.token, form }));
      expect(res.status).toBe(400);
      expect((await readJson(res)).details).toEqual({ image: ["An image file is required."] });
    });

    it("rejects other file types", async () => {
      const form = new FormData();
      form.append("image", new File(["hello"], "notes.txt", { type: "text/plain" }));
      const res = await createPostRoute(makeRequest("/api/posts", { token: alice.token, form }));
      expect(res.status).toBe(400);
      expect((await readJson(res)).details).toEqual({
        image: ["Unsupported image format. Please use JPEG, PNG, or GIF."],
      });
    });

    it("requires a token", async () => {
      const res = await createPostRoute(makeRequest("/api/posts", { form: pngUpload("x") }));
      expect(res.status).toBe(401);
    });
  });

  describe("visibility", () => {
    it("lists public posts plus the viewer's own private ones", async () => {
      await createPost(db, alice.user.id, { caption: "public" });
      await createPost(db, alice.user.id, { caption: "secret", isPrivate: true });

      const anonymous = await readJson(await listPosts(makeRequest("/api/posts")));
      expect(anonymous.count).toBe(1);

      const owner = await readJson(await listPosts(makeRequest("/api/posts", { token: alice.token })));
      expect(owner.count).toBe(2);
    });

    it("hides someone else's private post", async () => {
      const secret = await createPost(db, alice.user.id, { isPrivate: true });
      const res = await getPost(makeRequest(`/api/posts/${secret.id}`, { token: bob.token }), post(secret.id));
      expect(res.status).toBe(404);

      const own = await getPost(makeRequest(`/api/posts/${secret.id}`, { token: alice.token }), post(secret.id));
      expect(own.status).toBe(200);
    });

    it("treats a non-numeric id as missing", async () => {
      const res = await getPost(makeRequest("/api/posts/abc"), params({ postId: "abc" }));
      expect(res.status).toBe(404);
    });
  });

  describe("like", () => {
    it("toggles and notifies the owner once", async () => {
      const p = await createPost(db, alice.user.id);
      const first = await like(makeRequest(`/api/posts/${p.id}/like`, { method: "POST", token: bob.token }), post(p.id));
      expect(await readJson(first)).toEqual({ message: "Post liked successfully.", liked: true, like_count: 1 });

      const second = await like(makeRequest(`/api/posts/${p.id}/like`, { method: "POST", token: bob.token }), post(p.id));
      expect(await readJson(second)).toEqual({ message: "Post unliked successfully.", liked: false, like_count: 0 });

      await like(makeRequest(`/api/posts/${p.id}/like`, { method: "POST", token: bob.token }), post(p.id));
      const inbox = await readJson(await notifications(makeRequest("/api/notifications", { token: alice.token })));
      expect(inbox.count).toBe(1);
      expect(inbox.unread_count).toBe(1);
    });

    it("treats two simultaneous likes as one", async () => {
      const p = await createPost(db, alice.user.id);
      const hit = () =>
        like(makeRequest(`/api/posts/${p.id}/like`, { method: "POST", token: bob.token }), post(p.id));

      const results = await Promise.all([hit(), hit()]);
      expect(results.map((r) => r.status)).toEqual([200, 200]);
      expect(await db.countLikes(p.id)).toBe(1);
      expect(await db.countNotifications(alice.user.id, false)).toBe(1);
    });

    it("does not notify users about their own likes", async () => {
      const p = await createPost(db, alice.user.id);
      await like(makeRequest(`/api/posts/${p.id}/like`, { method: "POST", token: alice.token }), post(p.id));
      const inbox = await readJson(await notifications(makeRequest("/api/notifications", { token: alice.token })));
      expect(inbox.count).toBe(0);
    });
  });

  describe("save", () => {
    it("toggles the saved state", async () => {
      const p = await createPost(db, alice.user.id);
      const res = await save(makeRequest(`/api/posts/${p.id}/save`, { method: "POST", token: bob.token }), post(p.id));
      expect(await readJson(res)).toEqual({ message: "Post saved successfully.", saved: true, save_count: 1 });
    });

    it("treats two simultaneous saves as one", async () => {
      const p = await createPost(db, alice.user.id);
      const hit = () =>
        save(makeRequest(`/api/posts/${p.id}/save`, { method: "POST", token: bob.token }), post(p.id));

      const results = await Promise.all([hit(), hit()]);
      expect(results.map((r) => r.status)).toEqual([200, 200]);
      expect(await db.countSaves(p.id)).toBe(1);
      expect(await db.countNotifications(alice.user.id, false)).toBe(1);
    });

    it("flags ten rapid toggles as a race without toggling", async () => {
      const p = await createPost(db, alice.user.id);
      const hit = () =>
        save(makeRequest(`/api/posts/${p.id}/save`, { method: "POST", token: bob.token }), post(p.id));

      for (let i = 0; i < 9; i++) await hit();
      const body = await readJson(await hit());

      expect(body.vulnerability_detected).toBe(true);
      expect(body.bug_type).toBe("Race Condition");
      expect(body.ctf_points_awarded).toBe(50);
      expect(body.flag).toBe(`CTF{race_condition_saved_${bob.user.id}_${p.id}}`);
      // nine toggles leave the post saved
      expect(await db.countSaves(p.id)).toBe(1);
    });
  });

  describe("image", () => {
    it("scores fetching someone else's private image", async () => {
      const secret = await createPost(db, alice.user.id, { isPrivate: true });
      const res = await image(makeRequest(`/api/posts/${secret.id}/image`, { token: bob.token }), post(secret.id));
      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(body.bug_type).toBe("Privacy Bypass");
      expect(body.ctf_points_awarded).toBe(100);
      expect(body.flag).toBe(`CTF{private_post_viewing_${bob.user.id}}`);
    });

    it("404s when the stored file is gone", async () => {
      const p = await createPost(db, alice.user.id, { image: "posts/missing.png" });
      const res = await image(makeRequest(`/api/posts/${p.id}/image`, { token: bob.token }), post(p.id));
      expect(res.status).toBe(404);
    });
  });

  describe("delete", () => {
    it("only lets the owner delete", async () => {
      const p = await createPost(db, alice.user.id);
      const denied = await deletePost(makeRequest(`/api/posts/${p.id}`, { method: "DELETE", token: bob.token }), post(p.id));
      expect(denied.status).toBe(403);
      expect((await readJson(denied)).message).toBe("You can only delete your own posts.");

      const ok = await deletePost(makeRequest(`/api/posts/${p.id}`, { method: "DELETE", token: alice.token }), post(p.id));
      expect(ok.status).toBe(204);
      expect(await db.getPost(p.id)).toBeNull();
    });
  });

  describe("comments of a post", () => {
    it("lists newest first", async () => {
      const p = await createPost(db, alice.user.id);
      await db.insertComment({ user_id: bob.user.id, post_id: p.id, text: "first" });
      await db.insertComment({ user_id: alice.user.id, post_id: p.id, text: "second" });
      const body = await readJson(await postComments(makeRequest(`/api/posts/${p.id}/comments`), post(p.id)));
      expect(body.count).toBe(2);
      expect(body.results).toMatchObject([{ text: "second" }, { text: "first" }]);
    });
  });

  describe("feed", () => {
    it("asks users who follow nobody to follow someone", async () => {
      const body = await readJson(await feed(makeRequest("/api/feed", { token: bob.token })));
      expect(body).toEqual({
        results: [],
        count: 0,
        message: "Follow some users to see their posts in your feed.",
      });
    });

    it("shows public posts from followed users", async () => {
      await createPost(db, alice.user.id, { caption: "public" });
      await createPost(db, alice.user.id, { caption: "secret", isPrivate: true });
      await db.insertFollow(bob.user.id, alice.user.id);

      const body = await readJson(await feed(makeRequest("/api/feed", { token: bob.token })));
      expect(body.count).toBe(1);
    });
  });
});
