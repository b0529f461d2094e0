/**
 * Database adapter interface.
 * Single seam between route logic and storage.
 */

import type {
  BugCategory,
  BugRow,
  BugSolveRow,
  CommentDetailRow,
  CommentRow,
  LeaderboardRow,
  MessageDetailRow,
  NotificationDetailRow,
  NotificationRow,
  NotificationType,
  PendingDiscoveryRow,
  PostDetailRow,
  PostRow,
  PostVisibility,
  ThreadRow,
  TotalsRow,
  UserRow,
  UserStatsRow,
  UserSummaryRow,
} from "./types";

/**
 * Run multiple operations in a transaction.
 * On success: commit. On error/throw: rollback.
 */
export type TransactionFn<T> = (adapter: DbAdapter) => Promise<T>;

export interface PageOptions {
  limit: number;
  offset: number;
}

export interface NotificationMatch {
  sender_id: number;
  receiver_id: number;
  notification_type: NotificationType;
  post_id: number | null;
  comment_id: number | null;
}

export interface DbAdapter {
  /** Run operations in a transaction. Rolls back on error. */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;

  // --- Users ---
  getUserById(userId: number): Promise<UserRow | null>;
  getUserByUsername(username: string): Promise<UserRow | null>;
  getUserByEmail(email: string): Promise<UserRow | null>;
  insertUser(row: {
    username: string;
    email: string;
    password_hash: string;
  }): Promise<UserRow>;
  updateUser(
    userId: number,
    updates: Partial<Pick<UserRow, "bio" | "profile_picture" | "password_hash">>
  ): Promise<void>;
  /** Case-insensitive substring match on username. */
  searchUsers(
    query: string,
    excludeUserId: number | null,
    limit: number
  ): Promise<UserSummaryRow[]>;
  getUserStats(userId: number): Promise<UserStatsRow>;
  /** Adds points and one solved bug. Returns the updated user. */
  addUserScore(userId: number, points: number): Promise<UserRow | null>;
  listLeaderboard(limit: number): Promise<LeaderboardRow[]>;

  // --- Auth tokens ---
  getUserByToken(key: string): Promise<UserRow | null>;
  getTokenByUser(userId: number): Promise<string | null>;
  insertToken(userId: number, key: string): Promise<void>;
  deleteTokensByUser(userId: number): Promise<number>;

  // --- Follows ---
  isFollowing(followerId: number, followingId: number): Promise<boolean>;
  /** Returns false when the follow already existed. */
  insertFollow(followerId: number, followingId: number): Promise<boolean>;
  /** Returns false when there was nothing to delete. */
  deleteFollow(followerId: number, followingId: number): Promise<boolean>;

  // --- Posts ---
  getPost(postId: number): Promise<PostRow | null>;
  getPostDetail(postId: number, viewerId: number | null): Promise<PostDetailRow | null>;
  /** Public posts plus the viewer's own private posts, newest first. */
  listPosts(viewerId: number | null, page: PageOptions): Promise<PostDetailRow[]>;
  countPosts(viewerId: number | null): Promise<number>;
  listPostsByUser(
    userId: number,
    visibility: PostVisibility,
    viewerId: number | null
  ): Promise<PostDetailRow[]>;
  /** Posts by users the viewer follows, newest first. */
  listFeedPosts(viewerId: number): Promise<PostDetailRow[]>;
  /** Posts saved by the user, most recently saved first. */
  listSavedPosts(userId: number): Promise<PostDetailRow[]>;
  insertPost(row: {
    user_id: number;
    image: string;
    caption: string;
    is_private: boolean;
  }): Promise<PostRow>;
  deletePost(postId: number): Promise<void>;

  // --- Likes ---
  getLikeId(userId: number, postId: number): Promise<number | null>;
  /** Returns false when the like already existed. */
  insertLike(userId: number, postId: number): Promise<boolean>;
  deleteLike(likeId: number): Promise<void>;
  countLikes(postId: number): Promise<number>;

  // --- Saves ---
  getSaveId(userId: number, postId: number): Promise<number | null>;
  /** Returns false when the save already existed. */
  insertSave(userId: number, postId: number): Promise<boolean>;
  deleteSave(saveId: number): Promise<void>;
  countSaves(postId: number): Promise<number>;

  // --- Comments ---
  getComment(commentId: number): Promise<CommentRow | null>;
  getCommentDetail(commentId: number): Promise<CommentDetailRow | null>;
  insertComment(row: { user_id: number; post_id: number; text: string }): Promise<CommentRow>;
  deleteComment(commentId: number): Promise<void>;
  /**
   * Newest first. Without a page, returns every match. With `visibleTo`, only
   * comments on public posts or on that viewer's own posts (null: anonymous).
   */
  listComments(
    postId: number | null,
    page?: PageOptions,
    visibleTo?: number | null
  ): Promise<CommentDetailRow[]>;
  countComments(postId: number | null, visibleTo?: number | null): Promise<number>;
  hasCommented(userId: number, postId: number): Promise<boolean>;

  // --- Notifications ---
  findNotification(match: NotificationMatch): Promise<NotificationRow | null>;
  insertNotification(row: NotificationMatch): Promise<NotificationRow>;
  /** Unread first, then newest. */
  listNotifications(receiverId: number, limit: number): Promise<NotificationDetailRow[]>;
  countNotifications(receiverId: number, unreadOnly: boolean): Promise<number>;
  markNotificationRead(notificationId: number, receiverId: number): Promise<boolean>;
  markAllNotificationsRead(receiverId: number): Promise<number>;

  // --- Message threads ---
  getThread(threadId: number): Promise<ThreadRow | null>;
  listThreadsByUser(userId: number): Promise<ThreadRow[]>;
  listAllThreads(): Promise<ThreadRow[]>;
  findThreadBetween(userA: number, userB: number): Promise<ThreadRow | null>;
  insertThread(participantIds: number[]): Promise<ThreadRow>;
  acceptThread(threadId: number): Promise<void>;
  touchThread(threadId: number): Promise<void>;
  isThreadParticipant(threadId: number, userId: number): Promise<boolean>;
  getThreadParticipants(threadId: number): Promise<UserSummaryRow[]>;
  hasSentMessage(threadId: number, userId: number): Promise<boolean>;

  // --- Messages ---
  insertMessage(row: {
    thread_id: number;
    sender_id: number;
    text: string;
  }): Promise<MessageDetailRow>;
  /** Oldest first. */
  listMessages(threadId: number): Promise<MessageDetailRow[]>;
  getLastMessage(threadId: number): Promise<MessageDetailRow | null>;
  countMessages(threadId: number): Promise<number>;

  // --- CTF: bugs and solves ---
  upsertBug(row: {
    slug: string;
    title: string;
    description: string;
    category: BugCategory;
    points: number;
  }): Promise<BugRow>;
  /** Returns false when the user had already solved the bug. */
  insertBugSolve(userId: number, bugId: number): Promise<boolean>;
  listBugSolvesByUser(userId: number): Promise<BugSolveRow[]>;

  // --- CTF: pending discoveries ---
  upsertPendingDiscovery(row: {
    claim_key: string;
    bug_slug: string;
    details: Record<string, unknown>;
    expires_at: string;
  }): Promise<void>;
  /** Unexpired rows for the claim key, oldest first. */
  listPendingDiscoveries(claimKey: string, nowIso: string): Promise<PendingDiscoveryRow[]>;
  deletePendingDiscovery(id: number): Promise<void>;
  purgeExpiredPendingDiscoveries(nowIso: string): Promise<number>;

  // --- Stats ---
  getTotals(): Promise<TotalsRow>;
}
