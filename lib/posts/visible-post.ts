import type { DbAdapter } from "@/lib/db/adapter";
import type { PostRow } from "@/lib/db/types";

/** A post the viewer may see: public, or their own. Others' private posts read as missing. */
export async function getVisiblePost(
  db: DbAdapter,
  postId: number,
  viewerId: number | null
): Promise<PostRow | null> {
  const post = await db.getPost(postId);
  if (!post) return null;
  if (post.is_private === 1 && post.user_id !== viewerId) return null;
  return post;
}
