/**
 * Row shapes returned by the DbAdapter.
 * SQLite booleans come back as 0/1 integers; mapping to API shapes happens in lib/serializers.
 */

export interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  bio: string;
  profile_picture: string | null;
  points: number;
  bugs_solved: number;
  created_at: string;
  updated_at: string;
}

export interface UserSummaryRow {
  id: number;
  username: string;
  profile_picture: string | null;
}

export interface UserStatsRow {
  followers_count: number;
  following_count: number;
  posts_count: number;
}

export interface LeaderboardRow {
  id: number;
  username: string;
  points: number;
  bugs_solved: number;
}

export interface PostRow {
  id: number;
  user_id: number;
  image: string;
  caption: string;
  is_private: number;
  created_at: string;
}

/** Post joined with its author and the viewer's interaction flags. */
export interface PostDetailRow extends PostRow {
  username: string;
  author_profile_picture: string | null;
  like_count: number;
  comment_count: number;
  is_liked: number;
  is_saved: number;
}

export interface CommentRow {
  id: number;
  user_id: number;
  post_id: number;
  text: string;
  created_at: string;
}

export interface CommentDetailRow extends CommentRow {
  username: string;
  author_profile_picture: string | null;
}

export type NotificationType = "like" | "comment" | "follow" | "save";

export interface NotificationRow {
  id: number;
  sender_id: number;
  receiver_id: number;
  notification_type: NotificationType;
  post_id: number | null;
  comment_id: number | null;
  is_read: number;
  created_at: string;
}

export interface NotificationDetailRow extends NotificationRow {
  sender_username: string;
  sender_profile_picture: string | null;
  post_image: string | null;
  post_caption: string | null;
}

export interface ThreadRow {
  id: number;
  is_accepted: number;
  created_at: string;
  updated_at: string;
}

export interface MessageDetailRow {
  id: number;
  thread_id: number;
  sender_id: number;
  text: string;
  created_at: string;
  sender_username: string;
  sender_profile_picture: string | null;
}

export type BugCategory =
  | "security"
  | "ui_ux"
  | "performance"
  | "functionality"
  | "compatibility"
  | "other";

export interface BugRow {
  id: number;
  slug: string;
  title: string;
  description: string;
  category: BugCategory;
  points: number;
  created_at: string;
}

export interface BugSolveRow {
  bug_id: number;
  slug: string;
  solved_at: string;
}

export interface PendingDiscoveryRow {
  id: number;
  claim_key: string;
  bug_slug: string;
  /** JSON text */
  details: string;
  expires_at: string;
  created_at: string;
}

export interface TotalsRow {
  total_posts: number;
  total_likes: number;
  total_comments: number;
  total_saves: number;
}

export type PostVisibility = "all" | "public" | "private";
