/**
 * SQLite implementation of DbAdapter.
 * Uses better-sqlite3. Booleans are stored as 0/1, JSON columns as TEXT.
 */

import Database from "better-sqlite3";
import type { DbAdapter, NotificationMatch, PageOptions } from "./adapter";
import type {
  BugRow,
  BugSolveRow,
  CommentDetailRow,
  CommentRow,
  LeaderboardRow,
  MessageDetailRow,
  NotificationDetailRow,
  NotificationRow,
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
import { runMigrations } from "./migrate";

type CountRow = { n: number };

/** Viewer id used when nobody is signed in; never matches a row. */
const ANONYMOUS = -1;

const POST_DETAIL_SELECT = `
  SELECT p.*, u.username, u.profile_picture AS author_profile_picture,
    (SELECT COUNT(*) FROM post_like l WHERE l.post_id = p.id) AS like_count,
    (SELECT COUNT(*) FROM comment c WHERE c.post_id = p.id) AS comment_count,
    EXISTS (SELECT 1 FROM post_like l WHERE l.post_id = p.id AND l.user_id = @viewer) AS is_liked,
    EXISTS (SELECT 1 FROM post_save s WHERE s.post_id = p.id AND s.user_id = @viewer) AS is_saved
  FROM post p
  INNER JOIN app_user u ON u.id = p.user_id`;

const COMMENT_DETAIL_SELECT = `
  SELECT c.*, u.username, u.profile_picture AS author_profile_picture
  FROM comment c
  INNER JOIN app_user u ON u.id = c.user_id
  INNER JOIN post p ON p.id = c.post_id`;

/** WHERE clause over `c` (comment) and `p` (its post). */
function commentFilter(
  postId: number | null,
  visibleTo: number | null | undefined
): { sql: string; params: Record<string, number> } {
  const clauses: string[] = [];
  const params: Record<string, number> = {};
  if (postId !== null) {
    clauses.push("c.post_id = @post");
    params.post = postId;
  }
  if (visibleTo !== undefined) {
    clauses.push("(p.is_private = 0 OR p.user_id = @viewer)");
    params.viewer = visibleTo ?? ANONYMOUS;
  }
  return { sql: clauses.length ? `WHERE ${clauses.join(" AND ")}` : "", params };
}

const MESSAGE_DETAIL_SELECT = `
  SELECT m.*, u.username AS sender_username, u.profile_picture AS sender_profile_picture
  FROM message m
  INNER JOIN app_user u ON u.id = m.sender_id`;

function now(): string {
  return new Date().toISOString();
}

function asInt(flag: boolean): number {
  return flag ? 1 : 0;
}

export function createSqliteAdapter(dbPath: string | ":memory:"): DbAdapter {
  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  runMigrations(db);

  function count(sql: string, ...params: unknown[]): number {
    const row = db.prepare<unknown[], CountRow>(sql).get(...params);
    return row?.n ?? 0;
  }

  function requireRow<T>(row: T | undefined, what: string): T {
    if (row === undefined) throw new Error(`${what} not found after insert`);
    return row;
  }

  // Calls made through the adapter handed to a transaction body run inside it,
  // and a nested transaction() joins the open one.
  const direct: DbAdapter = {
    async transaction<T>(fn: (a: DbAdapter) => Promise<T>): Promise<T> {
      return fn(direct);
    },

    // --- Users ---
    async getUserById(userId) {
      return db.prepare<[number], UserRow>("SELECT * FROM app_user WHERE id = ?").get(userId) ?? null;
    },
    async getUserByUsername(username) {
      return (
        db.prepare<[string], UserRow>("SELECT * FROM app_user WHERE username = ?").get(username) ?? null
      );
    },
    async getUserByEmail(email) {
      return db.prepare<[string], UserRow>("SELECT * FROM app_user WHERE email = ?").get(email) ?? null;
    },
    async insertUser(row) {
      const ts = now();
      const r = db
        .prepare(
          "INSERT INTO app_user (username, email, password_hash, created_at, updated_at) VALUES (?, ?, ?, ?, ?)"
        )
        .run(row.username, row.email, row.password_hash, ts, ts);
      const user = db
        .prepare<[number], UserRow>("SELECT * FROM app_user WHERE id = ?")
        .get(Number(r.lastInsertRowid));
      return requireRow(user, "User");
    },
    async updateUser(userId, updates) {
      const set: string[] = ["updated_at = ?"];
      const vals: unknown[] = [now()];
      for (const [k, v] of Object.entries(updates)) {
        if (v !== undefined) {
          set.push(`${k} = ?`);
          vals.push(v);
        }
      }
      vals.push(userId);
      db.prepare(`UPDATE app_user SET ${set.join(", ")} WHERE id = ?`).run(...vals);
    },
    async searchUsers(query, excludeUserId, limit) {
      const escaped = query.replace(/[\\%_]/g, (ch) => `\\${ch}`);
      return db
        .prepare<[string, number, number], UserSummaryRow>(
          `SELECT id, username, profile_picture FROM app_user
           WHERE username LIKE ? ESCAPE '\\' COLLATE NOCASE AND id <> ?
           ORDER BY username ASC LIMIT ?`
        )
        .all(`%${escaped}%`, excludeUserId ?? ANONYMOUS, limit);
    },
    async getUserStats(userId) {
      const row = db
        .prepare<{ id: number }, UserStatsRow>(
          `SELECT
             (SELECT COUNT(*) FROM follow WHERE following_id = @id) AS followers_count,
             (SELECT COUNT(*) FROM follow WHERE follower_id = @id) AS following_count,
             (SELECT COUNT(*) FROM post WHERE user_id = @id) AS posts_count`
        )
        .get({ id: userId });
      return row ?? { followers_count: 0, following_count: 0, posts_count: 0 };
    },
    async addUserScore(userId, points) {
      db.prepare(
        "UPDATE app_user SET points = points + ?, bugs_solved = bugs_solved + 1, updated_at = ? WHERE id = ?"
      ).run(points, now(), userId);
      return db.prepare<[number], UserRow>("SELECT * FROM app_user WHERE id = ?").get(userId) ?? null;
    },
    async listLeaderboard(limit) {
      return db
        .prepare<[number], LeaderboardRow>(
          `SELECT id, username, points, bugs_solved FROM app_user
           ORDER BY points DESC, bugs_solved DESC, id ASC LIMIT ?`
        )
        .all(limit);
    },

    // --- Auth tokens ---
    async getUserByToken(key) {
      return (
        db
          .prepare<[string], UserRow>(
            "SELECT u.* FROM auth_token t INNER JOIN app_user u ON u.id = t.user_id WHERE t.key = ?"
          )
          .get(key) ?? null
      );
    },
    async getTokenByUser(userId) {
      const row = db
        .prepare<[number], { key: string }>("SELECT key FROM auth_token WHERE user_id = ?")
        .get(userId);
      return row?.key ?? null;
    },
    async insertToken(userId, key) {
      db.prepare("INSERT INTO auth_token (key, user_id, created_at) VALUES (?, ?, ?)").run(
        key,
        userId,
        now()
      );
    },
    async deleteTokensByUser(userId) {
      return db.prepare("DELETE FROM auth_token WHERE user_id = ?").run(userId).changes;
    },

    // --- Follows ---
    async isFollowing(followerId, followingId) {
      return (
        count(
          "SELECT COUNT(*) AS n FROM follow WHERE follower_id = ? AND following_id = ?",
          followerId,
          followingId
        ) > 0
      );
    },
    async insertFollow(followerId, followingId) {
      const r = db
        .prepare(
          "INSERT INTO follow (follower_id, following_id, created_at) VALUES (?, ?, ?) ON CONFLICT(follower_id, following_id) DO NOTHING"
        )
        .run(followerId, followingId, now());
      return r.changes > 0;
    },
    async deleteFollow(followerId, followingId) {
      const r = db
        .prepare("DELETE FROM follow WHERE follower_id = ? AND following_id = ?")
        .run(followerId, followingId);
      return r.changes > 0;
    },

    // --- Posts ---
    async getPost(postId) {
      return db.prepare<[number], PostRow>("SELECT * FROM post WHERE id = ?").get(postId) ?? null;
    },
    async getPostDetail(postId, viewerId) {
      return (
        db
          .prepare<{ id: number; viewer: number }, PostDetailRow>(
            `${POST_DETAIL_SELECT} WHERE p.id = @id`
          )
          .get({ id: postId, viewer: viewerId ?? ANONYMOUS }) ?? null
      );
    },
    async listPosts(viewerId, page: PageOptions) {
      return db
        .prepare<{ viewer: number; limit: number; offset: number }, PostDetailRow>(
          `${POST_DETAIL_SELECT}
           WHERE p.is_private = 0 OR p.user_id = @viewer
           ORDER BY p.created_at DESC, p.id DESC
           LIMIT @limit OFFSET @offset`
        )
        .all({ viewer: viewerId ?? ANONYMOUS, limit: page.limit, offset: page.offset });
    },
    async countPosts(viewerId) {
      return count(
        "SELECT COUNT(*) AS n FROM post WHERE is_private = 0 OR user_id = ?",
        viewerId ?? ANONYMOUS
      );
    },
    async listPostsByUser(userId, visibility: PostVisibility, viewerId) {
      const filter =
        visibility === "public"
          ? "AND p.is_private = 0"
          : visibility === "private"
            ? "AND p.is_private = 1"
            : "";
      return db
        .prepare<{ user: number; viewer: number }, PostDetailRow>(
          `${POST_DETAIL_SELECT}
           WHERE p.user_id = @user ${filter}
           ORDER BY p.created_at DESC, p.id DESC`
        )
        .all({ user: userId, viewer: viewerId ?? ANONYMOUS });
    },
    async listFeedPosts(viewerId) {
      return db
        .prepare<{ viewer: number }, PostDetailRow>(
          `${POST_DETAIL_SELECT}
           INNER JOIN follow f ON f.following_id = p.user_id AND f.follower_id = @viewer
           WHERE p.is_private = 0
           ORDER BY p.created_at DESC, p.id DESC`
        )
        .all({ viewer: viewerId });
    },
    async listSavedPosts(userId) {
      return db
        .prepare<{ viewer: number }, PostDetailRow>(
          `${POST_DETAIL_SELECT}
           INNER JOIN post_save sv ON sv.post_id = p.id AND sv.user_id = @viewer
           ORDER BY sv.created_at DESC, sv.id DESC`
        )
        .all({ viewer: userId });
    },
    async insertPost(row) {
      const r = db
        .prepare(
          "INSERT INTO post (user_id, image, caption, is_private, created_at) VALUES (?, ?, ?, ?, ?)"
        )
        .run(row.user_id, row.image, row.caption, asInt(row.is_private), now());
      const post = db
        .prepare<[number], PostRow>("SELECT * FROM post WHERE id = ?")
        .get(Number(r.lastInsertRowid));
      return requireRow(post, "Post");
    },
    async deletePost(postId) {
      db.prepare("DELETE FROM post WHERE id = ?").run(postId);
    },

    // --- Likes ---
    async getLikeId(userId, postId) {
      const row = db
        .prepare<[number, number], { id: number }>(
          "SELECT id FROM post_like WHERE user_id = ? AND post_id = ?"
        )
        .get(userId, postId);
      return row?.id ?? null;
    },
    async insertLike(userId, postId) {
      const r = db
        .prepare(
          "INSERT INTO post_like (user_id, post_id, created_at) VALUES (?, ?, ?) ON CONFLICT(user_id, post_id) DO NOTHING"
        )
        .run(userId, postId, now());
      return r.changes > 0;
    },
    async deleteLike(likeId) {
      db.prepare("DELETE FROM post_like WHERE id = ?").run(likeId);
    },
    async countLikes(postId) {
      return count("SELECT COUNT(*) AS n FROM post_like WHERE post_id = ?", postId);
    },

    // --- Saves ---
    async getSaveId(userId, postId) {
      const row = db
        .prepare<[number, number], { id: number }>(
          "SELECT id FROM post_save WHERE user_id = ? AND post_id = ?"
        )
        .get(userId, postId);
      return row?.id ?? null;
    },
    async insertSave(userId, postId) {
      const r = db
        .prepare(
          "INSERT INTO post_save (user_id, post_id, created_at) VALUES (?, ?, ?) ON CONFLICT(user_id, post_id) DO NOTHING"
        )
        .run(userId, postId, now());
      return r.changes > 0;
    },
    async deleteSave(saveId) {
      db.prepare("DELETE FROM post_save WHERE id = ?").run(saveId);
    },
    async countSaves(postId) {
      return count("SELECT COUNT(*) AS n FROM post_save WHERE post_id = ?", postId);
    },

    // --- Comments ---
    async getComment(commentId) {
      return (
        db.prepare<[number], CommentRow>("SELECT * FROM comment WHERE id = ?").get(commentId) ?? null
      );
    },
    async getCommentDetail(commentId) {
      return (
        db
          .prepare<[number], CommentDetailRow>(`${COMMENT_DETAIL_SELECT} WHERE c.id = ?`)
          .get(commentId) ?? null
      );
    },
    async insertComment(row) {
      const r = db
        .prepare("INSERT INTO comment (user_id, post_id, text, created_at) VALUES (?, ?, ?, ?)")
        .run(row.user_id, row.post_id, row.text, now());
      const comment = db
        .prepare<[number], CommentRow>("SELECT * FROM comment WHERE id = ?")
        .get(Number(r.lastInsertRowid));
      return requireRow(comment, "Comment");
    },
    async deleteComment(commentId) {
      db.prepare("DELETE FROM comment WHERE id = ?").run(commentId);
    },
    async listComments(postId, page, visibleTo) {
      const where = commentFilter(postId, visibleTo);
      const limit = page ? "LIMIT @limit OFFSET @offset" : "";
      return db
        .prepare<Record<string, number>, CommentDetailRow>(
          `${COMMENT_DETAIL_SELECT} ${where.sql} ORDER BY c.created_at DESC, c.id DESC ${limit}`
        )
        .all({
          ...where.params,
          ...(page ? { limit: page.limit, offset: page.offset } : {}),
        });
    },
    async countComments(postId, visibleTo) {
      const where = commentFilter(postId, visibleTo);
      const row = db
        .prepare<Record<string, number>, CountRow>(
          `SELECT COUNT(*) AS n FROM comment c INNER JOIN post p ON p.id = c.post_id ${where.sql}`
        )
        .get(where.params);
      return row?.n ?? 0;
    },
    async hasCommented(userId, postId) {
      return (
        count(
          "SELECT COUNT(*) AS n FROM comment WHERE user_id = ? AND post_id = ?",
          userId,
          postId
        ) > 0
      );
    },

    // --- Notifications ---
    async findNotification(match: NotificationMatch) {
      return (
        db
          .prepare<NotificationMatch, NotificationRow>(
            `SELECT * FROM notification
             WHERE sender_id = @sender_id AND receiver_id = @receiver_id
               AND notification_type = @notification_type
               AND post_id IS @post_id AND comment_id IS @comment_id
             ORDER BY id ASC LIMIT 1`
          )
          .get(match) ?? null
      );
    },
    async insertNotification(row) {
      const r = db
        .prepare(
          `INSERT INTO notification (sender_id, receiver_id, notification_type, post_id, comment_id, is_read, created_at)
           VALUES (?, ?, ?, ?, ?, 0, ?)`
        )
        .run(row.sender_id, row.receiver_id, row.notification_type, row.post_id, row.comment_id, now());
      const notification = db
        .prepare<[number], NotificationRow>("SELECT * FROM notification WHERE id = ?")
        .get(Number(r.lastInsertRowid));
      return requireRow(notification, "Notification");
    },
    async listNotifications(receiverId, limit) {
      return db
        .prepare<[number, number], NotificationDetailRow>(
          `SELECT n.*, s.username AS sender_username, s.profile_picture AS sender_profile_picture,
             p.image AS post_image, p.caption AS post_caption
           FROM notification n
           INNER JOIN app_user s ON s.id = n.sender_id
           LEFT JOIN post p ON p.id = n.post_id
           WHERE n.receiver_id = ?
           ORDER BY n.is_read ASC, n.created_at DESC, n.id DESC
           LIMIT ?`
        )
        .all(receiverId, limit);
    },
    async countNotifications(receiverId, unreadOnly) {
      return count(
        `SELECT COUNT(*) AS n FROM notification WHERE receiver_id = ?${unreadOnly ? " AND is_read = 0" : ""}`,
        receiverId
      );
    },
    async markNotificationRead(notificationId, receiverId) {
      const r = db
        .prepare("UPDATE notification SET is_read = 1 WHERE id = ? AND receiver_id = ?")
        .run(notificationId, receiverId);
      return r.changes > 0;
    },
    async markAllNotificationsRead(receiverId) {
      return db
        .prepare("UPDATE notification SET is_read = 1 WHERE receiver_id = ? AND is_read = 0")
        .run(receiverId).changes;
    },

    // --- Message threads ---
    async getThread(threadId) {
      return (
        db.prepare<[number], ThreadRow>("SELECT * FROM message_thread WHERE id = ?").get(threadId) ??
        null
      );
    },
    async listThreadsByUser(userId) {
      return db
        .prepare<[number], ThreadRow>(
          `SELECT t.* FROM message_thread t
           INNER JOIN thread_participant tp ON tp.thread_id = t.id
           WHERE tp.user_id = ?
           ORDER BY t.updated_at DESC, t.id DESC`
        )
        .all(userId);
    },
    async listAllThreads() {
      return db.prepare<[], ThreadRow>("SELECT * FROM message_thread ORDER BY id ASC").all();
    },
    async findThreadBetween(userA, userB) {
      return (
        db
          .prepare<[number, number], ThreadRow>(
            `SELECT t.* FROM message_thread t
             INNER JOIN thread_participant a ON a.thread_id = t.id AND a.user_id = ?
             INNER JOIN thread_participant b ON b.thread_id = t.id AND b.user_id = ?
             ORDER BY t.id ASC LIMIT 1`
          )
          .get(userA, userB) ?? null
      );
    },
    async insertThread(participantIds) {
      const ts = now();
      const r = db
        .prepare("INSERT INTO message_thread (is_accepted, created_at, updated_at) VALUES (0, ?, ?)")
        .run(ts, ts);
      const threadId = Number(r.lastInsertRowid);
      const addParticipant = db.prepare(
        "INSERT OR IGNORE INTO thread_participant (thread_id, user_id) VALUES (?, ?)"
      );
      for (const userId of participantIds) addParticipant.run(threadId, userId);
      const thread = db
        .prepare<[number], ThreadRow>("SELECT * FROM message_thread WHERE id = ?")
        .get(threadId);
      return requireRow(thread, "Thread");
    },
    async acceptThread(threadId) {
      db.prepare("UPDATE message_thread SET is_accepted = 1, updated_at = ? WHERE id = ?").run(
        now(),
        threadId
      );
    },
    async touchThread(threadId) {
      db.prepare("UPDATE message_thread SET updated_at = ? WHERE id = ?").run(now(), threadId);
    },
    async isThreadParticipant(threadId, userId) {
      return (
        count(
          "SELECT COUNT(*) AS n FROM thread_participant WHERE thread_id = ? AND user_id = ?",
          threadId,
          userId
        ) > 0
      );
    },
    async getThreadParticipants(threadId) {
      return db
        .prepare<[number], UserSummaryRow>(
          `SELECT u.id, u.username, u.profile_picture FROM thread_participant tp
           INNER JOIN app_user u ON u.id = tp.user_id
           WHERE tp.thread_id = ? ORDER BY u.id ASC`
        )
        .all(threadId);
    },
    async hasSentMessage(threadId, userId) {
      return (
        count(
          "SELECT COUNT(*) AS n FROM message WHERE thread_id = ? AND sender_id = ?",
          threadId,
          userId
        ) > 0
      );
    },

    // --- Messages ---
    async insertMessage(row) {
      const r = db
        .prepare("INSERT INTO message (thread_id, sender_id, text, created_at) VALUES (?, ?, ?, ?)")
        .run(row.thread_id, row.sender_id, row.text, now());
      const message = db
        .prepare<[number], MessageDetailRow>(`${MESSAGE_DETAIL_SELECT} WHERE m.id = ?`)
        .get(Number(r.lastInsertRowid));
      return requireRow(message, "Message");
    },
    async listMessages(threadId) {
      return db
        .prepare<[number], MessageDetailRow>(
          `${MESSAGE_DETAIL_SELECT} WHERE m.thread_id = ? ORDER BY m.created_at ASC, m.id ASC`
        )
        .all(threadId);
    },
    async getLastMessage(threadId) {
      return (
        db
          .prepare<[number], MessageDetailRow>(
            `${MESSAGE_DETAIL_SELECT} WHERE m.thread_id = ? ORDER BY m.created_at DESC, m.id DESC LIMIT 1`
          )
          .get(threadId) ?? null
      );
    },
    async countMessages(threadId) {
      return count("SELECT COUNT(*) AS n FROM message WHERE thread_id = ?", threadId);
    },

    // --- CTF: bugs and solves ---
    async upsertBug(row) {
      db.prepare(
        `INSERT INTO bug (slug, title, description, category, points, created_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(slug) DO UPDATE SET title = excluded.title, description = excluded.description,
           category = excluded.category, points = excluded.points`
      ).run(row.slug, row.title, row.description, row.category, row.points, now());
      const bug = db.prepare<[string], BugRow>("SELECT * FROM bug WHERE slug = ?").get(row.slug);
      return requireRow(bug, "Bug");
    },
    async insertBugSolve(userId, bugId) {
      const r = db
        .prepare(
          "INSERT INTO bug_solve (user_id, bug_id, solved_at) VALUES (?, ?, ?) ON CONFLICT(user_id, bug_id) DO NOTHING"
        )
        .run(userId, bugId, now());
      return r.changes > 0;
    },
    async listBugSolvesByUser(userId) {
      return db
        .prepare<[number], BugSolveRow>(
          `SELECT bs.bug_id, b.slug, bs.solved_at FROM bug_solve bs
           INNER JOIN bug b ON b.id = bs.bug_id
           WHERE bs.user_id = ? ORDER BY bs.solved_at ASC, bs.id ASC`
        )
        .all(userId);
    },

    // --- CTF: pending discoveries ---
    async upsertPendingDiscovery(row) {
      db.prepare(
        `INSERT INTO pending_discovery (claim_key, bug_slug, details, expires_at, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(claim_key, bug_slug) DO UPDATE SET details = excluded.details, expires_at = excluded.expires_at`
      ).run(row.claim_key, row.bug_slug, JSON.stringify(row.details), row.expires_at, now());
    },
    async listPendingDiscoveries(claimKey, nowIso) {
      return db
        .prepare<[string, string], PendingDiscoveryRow>(
          `SELECT * FROM pending_discovery WHERE claim_key = ? AND expires_at > ?
           ORDER BY created_at ASC, id ASC`
        )
        .all(claimKey, nowIso);
    },
    async deletePendingDiscovery(id) {
      db.prepare("DELETE FROM pending_discovery WHERE id = ?").run(id);
    },
    async purgeExpiredPendingDiscoveries(nowIso) {
      return db.prepare("DELETE FROM pending_discovery WHERE expires_at <= ?").run(nowIso).changes;
    },

    // --- Stats ---
    async getTotals() {
      const row = db
        .prepare<[], TotalsRow>(
          `SELECT
             (SELECT COUNT(*) FROM post) AS total_posts,
             (SELECT COUNT(*) FROM post_like) AS total_likes,
             (SELECT COUNT(*) FROM comment) AS total_comments,
             (SELECT COUNT(*) FROM post_save) AS total_saves`
        )
        .get();
      return row ?? { total_posts: 0, total_likes: 0, total_comments: 0, total_saves: 0 };
    },
  };

  return guardTransactions(db, direct);
}

/**
 * One connection serves every request, so while a transaction is open all
 * other calls wait for it: transactions queue behind each other and plain
 * calls cannot land between the awaits of an open BEGIN.
 */
function guardTransactions(db: Database.Database, direct: DbAdapter): DbAdapter {
  let txQueue: Promise<void> = Promise.resolve();
  let open = false;

  function outside<A extends unknown[], R>(fn: (...args: A) => Promise<R>) {
    return async (...args: A): Promise<R> => {
      while (open) await txQueue;
      return fn(...args);
    };
  }

  return {
    async transaction<T>(fn: (a: DbAdapter) => Promise<T>): Promise<T> {
      const run = async (): Promise<T> => {
        while (open) await txQueue;
        open = true;
        db.exec("BEGIN");
        try {
          const result = await fn(direct);
          db.exec("COMMIT");
          return result;
        } catch (e) {
          db.exec("ROLLBACK");
          throw e;
        } finally {
          open = false;
        }
      };
      const result = txQueue.then(run);
      txQueue = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },
    getUserById: outside(direct.getUserById),
    getUserByUsername: outside(direct.getUserByUsername),
    getUserByEmail: outside(direct.getUserByEmail),
    insertUser: outside(direct.insertUser),
    updateUser: outside(direct.updateUser),
    searchUsers: outside(direct.searchUsers),
    getUserStats: outside(direct.getUserStats),
    addUserScore: outside(direct.addUserScore),
    listLeaderboard: outside(direct.listLeaderboard),
    getUserByToken: outside(direct.getUserByToken),
    getTokenByUser: outside(direct.getTokenByUser),
    insertToken: outside(direct.insertToken),
    deleteTokensByUser: outside(direct.deleteTokensByUser),
    isFollowing: outside(direct.isFollowing),
    insertFollow: outside(direct.insertFollow),
    deleteFollow: outside(direct.deleteFollow),
    getPost: outside(direct.getPost),
    getPostDetail: outside(direct.getPostDetail),
    listPosts: outside(direct.listPosts),
    countPosts: outside(direct.countPosts),
    listPostsByUser: outside(direct.listPostsByUser),
    listFeedPosts: outside(direct.listFeedPosts),
    listSavedPosts: outside(direct.listSavedPosts),
    insertPost: outside(direct.insertPost),
    deletePost: outside(direct.deletePost),
    getLikeId: outside(direct.getLikeId),
    insertLike: outside(direct.insertLike),
    deleteLike: outside(direct.deleteLike),
    countLikes: outside(direct.countLikes),
    getSaveId: outside(direct.getSaveId),
    insertSave: outside(direct.insertSave),
    deleteSave: outside(direct.deleteSave),
    countSaves: outside(direct.countSaves),
    getComment: outside(direct.getComment),
    getCommentDetail: outside(direct.getCommentDetail),
    insertComment: outside(direct.insertComment),
    deleteComment: outside(direct.deleteComment),
    listComments: outside(direct.listComments),
    countComments: outside(direct.countComments),
    hasCommented: outside(direct.hasCommented),
    findNotification: outside(direct.findNotification),
    insertNotification: outside(direct.insertNotification),
    listNotifications: outside(direct.listNotifications),
    countNotifications: outside(direct.countNotifications),
    markNotificationRead: outside(direct.markNotificationRead),
    markAllNotificationsRead: outside(direct.markAllNotificationsRead),
    getThread: outside(direct.getThread),
    listThreadsByUser: outside(direct.listThreadsByUser),
    listAllThreads: outside(direct.listAllThreads),
    findThreadBetween: outside(direct.findThreadBetween),
    insertThread: outside(direct.insertThread),
    acceptThread: outside(direct.acceptThread),
    touchThread: outside(direct.touchThread),
    isThreadParticipant: outside(direct.isThreadParticipant),
    getThreadParticipants: outside(direct.getThreadParticipants),
    hasSentMessage: outside(direct.hasSentMessage),
    insertMessage: outside(direct.insertMessage),
    listMessages: outside(direct.listMessages),
    getLastMessage: outside(direct.getLastMessage),
    countMessages: outside(direct.countMessages),
    upsertBug: outside(direct.upsertBug),
    insertBugSolve: outside(direct.insertBugSolve),
    listBugSolvesByUser: outside(direct.listBugSolvesByUser),
    upsertPendingDiscovery: outside(direct.upsertPendingDiscovery),
    listPendingDiscoveries: outside(direct.listPendingDiscoveries),
    deletePendingDiscovery: outside(direct.deletePendingDiscovery),
    purgeExpiredPendingDiscoveries: outside(direct.purgeExpiredPendingDiscoveries),
    getTotals: outside(direct.getTotals),
  };
}
