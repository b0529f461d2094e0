'use client';

import type { ReactNode } from 'react';
import { Heart, Bookmark, MessageCircle, Lock } from 'lucide-react';
import type { PostView } from '@/lib/serializers';

interface PostCardProps {
  post: PostView;
  onToggleLike?: (postId: number) => void;
  onToggleSave?: (postId: number) => void;
  /** Rendered under the caption (e.g. a comment form). */
  children?: ReactNode;
}

export function PostCard({ post, onToggleLike, onToggleSave, children }: PostCardProps) {
  return (
    <article className="overflow-hidden rounded-lg border border-border bg-card">
      <header className="flex items-center gap-2 px-4 py-3">
        <span className="text-sm font-semibold">{post.user.username}</span>
        {post.is_private && <Lock aria-label="Private" className="h-3.5 w-3.5 text-muted-foreground" />}
      </header>
      {/* eslint-disable-next-line @next/next/no-img-element */}
      <img src={post.image} alt={post.caption || `Post by ${post.user.username}`} className="w-full object-cover" />
      <div className="flex items-center gap-4 px-4 pt-3 text-sm">
        <button
          type="button"
          aria-pressed={post.is_liked}
          aria-label={post.is_liked ? 'Unlike' : 'Like'}
          onClick={() => onToggleLike?.(post.id)}
          className="inline-flex items-center gap-1"
        >
          <Heart className={`h-4 w-4 ${post.is_liked ? 'fill-red-500 text-red-500' : ''}`} />
          <span data-testid="like-count">{post.like_count}</span>
        </button>
        <span className="inline-flex items-center gap-1 text-muted-foreground">
          <MessageCircle className="h-4 w-4" />
          {post.comment_count}
        </span>
        <button
          type="button"
          aria-pressed={post.is_saved}
          aria-label={post.is_saved ? 'Unsave' : 'Save'}
          onClick={() => onToggleSave?.(post.id)}
          className="ml-auto"
        >
          <Bookmark className={`h-4 w-4 ${post.is_saved ? 'fill-current' : ''}`} />
        </button>
      </div>
      {post.caption && (
        <p className="px-4 pt-2 text-sm">
          <span className="mr-1 font-semibold">{post.user.username}</span>
          {post.caption}
        </p>
      )}
      <div className="px-4 py-3">{children}</div>
    </article>
  );
}
