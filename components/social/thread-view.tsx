'use client';

import { useState, type FormEvent } from 'react';
import { Radio } from 'lucide-react';
import { useThreadMessages } from '@/lib/hooks';

interface ThreadViewProps {
  threadId: number;
  currentUserId: number | null;
}

export function ThreadView({ threadId, currentUserId }: ThreadViewProps) {
  const { messages, loading, error, live, send } = useThreadMessages(threadId);
  const [draft, setDraft] = useState('');

  const handleSend = async (e: FormEvent) => {
    e.preventDefault();
    const text = draft.trim();
    if (!text) return;
    if (await send(text)) setDraft('');
  };

  return (
    <section className="flex h-full flex-col">
      <div className="flex items-center justify-between border-b border-border px-4 py-2 text-xs text-muted-foreground">
        <span>Thread #{threadId}</span>
        {live && (
          <span className="inline-flex items-center gap-1 text-emerald-600">
            <Radio className="h-3 w-3" /> live
          </span>
        )}
      </div>
      <ol className="flex-1 space-y-2 overflow-y-auto p-4">
        {loading && <li className="text-xs text-muted-foreground">Loading…</li>}
        {messages.map((m) => (
          <li
            key={m.id}
            className={`max-w-[75%] rounded-lg px-3 py-2 text-sm ${
              m.sender.id === currentUserId ? 'ml-auto bg-primary/10' : 'bg-muted'
            }`}
          >
            <span className="block text-xs font-semibold">{m.sender.username}</span>
            {m.text}
          </li>
        ))}
      </ol>
      {error && <p className="px-4 text-xs text-red-600">{error}</p>}
      <form onSubmit={handleSend} className="flex gap-2 border-t border-border p-3">
        <input
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          placeholder="Message…"
          aria-label="Message"
          className="flex-1 rounded-md border border-border bg-transparent px-2 py-1 text-sm"
        />
        <button type="submit" className="text-sm font-medium">
          Send
        </button>
      </form>
    </section>
  );
}
