'use client';

import { useState, type FormEvent } from 'react';
import { Send } from 'lucide-react';

interface CommentFormProps {
  postId: number;
  /** Resolves true when the comment was accepted; the field is cleared then. */
  onSubmit: (postId: number, text: string) => Promise<boolean>;
}

const MAX_LENGTH = 500;

export function CommentForm({ postId, onSubmit }: CommentFormProps) {
  const [text, setText] = useState('');
  const [busy, setBusy] = useState(false);

  const trimmed = text.trim();

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    if (!trimmed || busy) return;
    setBusy(true);
    try {
      if (await onSubmit(postId, text)) setText('');
    } finally {
      setBusy(false);
    }
  };

  return (
    <form onSubmit={handleSubmit} className="flex items-center gap-2">
      <input
        value={text}
        onChange={(e) => setText(e.target.value)}
        placeholder="Add a comment…"
        aria-label="Comment"
        className="flex-1 rounded-md border border-border bg-transparent px-2 py-1 text-sm"
      />
      {trimmed.length > MAX_LENGTH && (
        <span className="text-xs text-red-600">{trimmed.length}/{MAX_LENGTH}</span>
      )}
      <button
        type="submit"
        aria-label="Post comment"
        disabled={!trimmed || busy}
        className="text-sm font-medium text-primary disabled:opacity-40"
      >
        <Send className="h-4 w-4" />
      </button>
    </form>
  );
}
