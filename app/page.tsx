'use client';

import Link from 'next/link';
import { toast } from 'sonner';
import { Loader2 } from 'lucide-react';
import { useFeed } from '@/lib/hooks';
import { apiFetch, ApiRequestError } from '@/lib/api-client';
import { PostCard } from '@/components/social/post-card';
import { CommentForm } from '@/components/social/comment-form';

interface LikeResponse {
  liked: boolean;
  like_count: number;
}

interface SaveResponse {
  saved?: boolean;
  save_count?: number;
}

export default function FeedPage() {
  const { posts, message, loading, error, updatePost } = useFeed();

  const toggleLike = async (postId: number) => {
    try {
      const res = await apiFetch<LikeResponse>(`/api/posts/${postId}/like`, { method: 'POST' });
      updatePost(postId, { is_liked: res.liked, like_count: res.like_count });
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Could not like the post');
    }
  };

  const toggleSave = async (postId: number) => {
    try {
      const res = await apiFetch<SaveResponse>(`/api/posts/${postId}/save`, { method: 'POST' });
      // A detector response carries no toggle state.
      if (res.saved !== undefined) updatePost(postId, { is_saved: res.saved });
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Could not save the post');
    }
  };

  const addComment = async (postId: number, text: string) => {
    try {
      const res = await apiFetch<{ id?: number }>('/api/comments', {
        method: 'POST',
        body: JSON.stringify({ post: postId, text }),
      });
      if (res.id === undefined) return false;
      const post = posts.find((p) => p.id === postId);
      if (post) updatePost(postId, { comment_count: post.comment_count + 1 });
      return true;
    } catch (err) {
      const msg = err instanceof ApiRequestError ? err.message : 'Could not post the comment';
      toast.error(msg);
      return false;
    }
  };

  if (loading) {
    return <Loader2 className="mx-auto mt-12 h-6 w-6 animate-spin text-muted-foreground" />;
  }

  if (error) {
    return (
      <p className="mt-12 text-center text-sm text-muted-foreground">
        {error}. <Link href="/login" className="text-primary hover:underline">Sign in</Link>
      </p>
    );
  }

  return (
    <div className="space-y-6">
      {message && <p className="text-center text-sm text-muted-foreground">{message}</p>}
      {posts.map((post) => (
        <PostCard key={post.id} post={post} onToggleLike={toggleLike} onToggleSave={toggleSave}>
          <CommentForm postId={post.id} onSubmit={addComment} />
        </PostCard>
      ))}
    </div>
  );
}
