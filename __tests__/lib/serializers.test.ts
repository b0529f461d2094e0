import { describe, it, expect } from "vitest";
import {
  mediaUrl,
  notificationView,
  pageEnvelope,
  postView,
  timeAgo,
  truncateCaption,
} from "@/lib/serializers";
import type { NotificationDetailRow, PostDetailRow } from "@/lib/db/types";

const ORIGIN = "http://localhost:3000";
const NOW = new Date("2025-03-01T12:00:00.000Z");

describe("mediaUrl", () => {
  it("builds an absolute, encoded media URL", () => {
    expect(mediaUrl(ORIGIN, "posts/a b.jpg")).toBe(`${ORIGIN}/media/posts/a%20b.jpg`);
  });

  it("passes null through", () => {
    expect(mediaUrl(ORIGIN, null)).toBeNull();
  });
});

describe("timeAgo", () => {
  it.each([
    ["2025-02-27T11:00:00.000Z", "2d"],
    ["2025-03-01T09:30:00.000Z", "2h"],
    ["2025-03-01T11:00:00.000Z", "60m"],
    ["2025-03-01T11:58:59.000Z", "1m"],
    ["2025-03-01T11:59:30.000Z", "now"],
  ])("%s → %s", (createdAt, expected) => {
    expect(timeAgo(createdAt, NOW)).toBe(expected);
  });
});

describe("truncateCaption", () => {
  it("keeps captions up to 50 characters", () => {
    expect(truncateCaption("x".repeat(50))).toBe("x".repeat(50));
  });

  it("cuts longer captions and adds an ellipsis", () => {
    expect(truncateCaption("x".repeat(60))).toBe(`${"x".repeat(50)}...`);
  });
});

describe("postView", () => {
  it("maps flags to booleans and nests the author", () => {
    const row: PostDetailRow = {
      id: 3,
      user_id: 1,
      image: "posts/p.png",
      caption: "hello",
      is_private: 1,
      created_at: "2025-03-01T10:00:00.000Z",
      username: "alice",
      author_profile_picture: null,
      like_count: 2,
      comment_count: 1,
      is_liked: 1,
      is_saved: 0,
    };
    expect(postView(ORIGIN, row)).toEqual({
      id: 3,
      user: { id: 1, username: "alice", profile_picture: null },
      image: `${ORIGIN}/media/posts/p.png`,
      caption: "hello",
      is_private: true,
      created_at: "2025-03-01T10:00:00.000Z",
      like_count: 2,
      comment_count: 1,
      is_liked: true,
      is_saved: false,
    });
  });
});

describe("notificationView", () => {
  const base: NotificationDetailRow = {
    id: 9,
    sender_id: 2,
    receiver_id: 1,
    notification_type: "like",
    post_id: 3,
    comment_id: null,
    is_read: 0,
    created_at: "2025-03-01T09:00:00.000Z",
    sender_username: "bob",
    sender_profile_picture: null,
    post_image: "posts/p.png",
    post_caption: "y".repeat(55),
  };

  it("describes the action and previews the post", () => {
    expect(notificationView(ORIGIN, base, NOW)).toEqual({
      id: 9,
      actor: { id: 2, username: "bob", profile_picture: null },
      verb: "liked your post",
      target_post: { id: 3, image: `${ORIGIN}/media/posts/p.png`, caption: `${"y".repeat(50)}...` },
      created_at: "2025-03-01T09:00:00.000Z",
      time_ago: "3h",
      is_read: false,
    });
  });

  it("has no target post for follows", () => {
    const view = notificationView(
      ORIGIN,
      { ...base, notification_type: "follow", post_id: null, post_image: null, post_caption: null },
      NOW
    );
    expect(view.verb).toBe("started following you");
    expect(view.target_post).toBeNull();
  });
});

describe("pageEnvelope", () => {
  it("links neighbouring pages and keeps other params", () => {
    const url = new URL(`${ORIGIN}/api/posts?page=2&q=a`);
    const page = pageEnvelope(url, 2, 20, 45, ["r"]);
    expect(page).toEqual({
      count: 45,
      next: `${ORIGIN}/api/posts?page=3&q=a`,
      previous: `${ORIGIN}/api/posts?q=a`,
      results: ["r"],
    });
  });

  it("has no links for a single page", () => {
    const page = pageEnvelope(new URL(`${ORIGIN}/api/posts`), 1, 20, 5, []);
    expect(page.next).toBeNull();
    expect(page.previous).toBeNull();
  });
});
