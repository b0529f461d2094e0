/**
 * Map database rows to API response shapes.
 * Media paths become absolute URLs under /media on the request's origin.
 */

import type {
  CommentDetailRow,
  MessageDetailRow,
  NotificationDetailRow,
  NotificationType,
  PostDetailRow,
  ThreadRow,
  UserSummaryRow,
} from "@/lib/db/types";

export interface UserSummary {
  id: number;
  username: string;
  profile_picture: string | null;
}

export interface PostView {
  id: number;
  user: UserSummary;
  image: string;
  caption: string;
  is_private: boolean;
  created_at: string;
  like_count: number;
  comment_count: number;
  is_liked: boolean;
  is_saved: boolean;
}

export interface CommentView {
  id: number;
  user: UserSummary;
  post: number;
  text: string;
  created_at: string;
}

export interface NotificationView {
  id: number;
  actor: UserSummary;
  verb: string;
  target_post: { id: number; image: string | null; caption: string } | null;
  created_at: string;
  time_ago: string;
  is_read: boolean;
}

export interface MessageView {
  id: number;
  thread_id: number;
  sender: UserSummary;
  text: string;
  created_at: string;
}

export interface ThreadView {
  id: number;
  participants: UserSummary[];
  is_accepted: boolean;
  last_message: MessageView | null;
  created_at: string;
  updated_at: string;
}

export function mediaUrl(origin: string, path: string): string;
export function mediaUrl(origin: string, path: string | null): string | null;
export function mediaUrl(origin: string, path: string | null): string | null {
  if (!path) return null;
  const clean = path.replace(/^\/+/, "");
  return `${origin}/media/${clean.split("/").map(encodeURIComponent).join("/")}`;
}

export function userSummary(origin: string, row: UserSummaryRow): UserSummary {
  return {
    id: row.id,
    username: row.username,
    profile_picture: mediaUrl(origin, row.profile_picture),
  };
}

export function postView(origin: string, row: PostDetailRow): PostView {
  return {
    id: row.id,
    user: userSummary(origin, {
      id: row.user_id,
      username: row.username,
      profile_picture: row.author_profile_picture,
    }),
    image: mediaUrl(origin, row.image),
    caption: row.caption,
    is_private: row.is_private === 1,
    created_at: row.created_at,
    like_count: row.like_count,
    comment_count: row.comment_count,
    is_liked: row.is_liked === 1,
    is_saved: row.is_saved === 1,
  };
}

export function commentView(origin: string, row: CommentDetailRow): CommentView {
  return {
    id: row.id,
    user: userSummary(origin, {
      id: row.user_id,
      username: row.username,
      profile_picture: row.author_profile_picture,
    }),
    post: row.post_id,
    text: row.text,
    created_at: row.created_at,
  };
}

const VERBS: Record<NotificationType, string> = {
  like: "liked your post",
  comment: "commented on your post",
  follow: "started following you",
  save: "saved your post",
};

/** Caption preview: first 50 characters, with an ellipsis when cut. */
export function truncateCaption(caption: string, max = 50): string {
  return caption.length > max ? `${caption.slice(0, max)}...` : caption;
}

/** Compact age: whole days, else hours, else minutes, else "now". */
export function timeAgo(createdAt: string, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - Date.parse(createdAt)) / 1000));
  const days = Math.floor(seconds / 86400);
  if (days > 0) return `${days}d`;
  const rest = seconds % 86400;
  if (rest > 3600) return `${Math.floor(rest / 3600)}h`;
  if (rest > 60) return `${Math.floor(rest / 60)}m`;
  return "now";
}

export function notificationView(
  origin: string,
  row: NotificationDetailRow,
  now: Date = new Date()
): NotificationView {
  return {
    id: row.id,
    actor: userSummary(origin, {
      id: row.sender_id,
      username: row.sender_username,
      profile_picture: row.sender_profile_picture,
    }),
    verb: VERBS[row.notification_type],
    target_post:
      row.post_id !== null
        ? {
            id: row.post_id,
            image: mediaUrl(origin, row.post_image),
            caption: truncateCaption(row.post_caption ?? ""),
          }
        : null,
    created_at: row.created_at,
    time_ago: timeAgo(row.created_at, now),
    is_read: row.is_read === 1,
  };
}

export function messageView(origin: string, row: MessageDetailRow): MessageView {
  return {
    id: row.id,
    thread_id: row.thread_id,
    sender: userSummary(origin, {
      id: row.sender_id,
      username: row.sender_username,
      profile_picture: row.sender_profile_picture,
    }),
    text: row.text,
    created_at: row.created_at,
  };
}

export function threadView(
  origin: string,
  thread: ThreadRow,
  participants: UserSummaryRow[],
  lastMessage: MessageDetailRow | null
): ThreadView {
  return {
    id: thread.id,
    participants: participants.map((p) => userSummary(origin, p)),
    is_accepted: thread.is_accepted === 1,
    last_message: lastMessage ? messageView(origin, lastMessage) : null,
    created_at: thread.created_at,
    updated_at: thread.updated_at,
  };
}

export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

/** Page envelope with next/previous links that keep the other query params. */
export function pageEnvelope<T>(
  url: URL,
  page: number,
  pageSize: number,
  count: number,
  results: T[]
): Page<T> {
  const link = (n: number): string => {
    const u = new URL(url.toString());
    if (n === 1) u.searchParams.delete("page");
    else u.searchParams.set("page", String(n));
    return u.toString();
  };
  return {
    count,
    next: page * pageSize < count ? link(page + 1) : null,
    previous: page > 1 ? link(page - 1) : null,
    results,
  };
}
