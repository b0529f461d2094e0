'use client';

import { useEffect, useState } from 'react';
import { useThreads } from '@/lib/hooks';
import { apiFetch } from '@/lib/api-client';
import type { ThreadView as Thread } from '@/lib/serializers';
import { ThreadView } from '@/components/social/thread-view';
import { ErrorBoundary } from '@/components/error-boundary';

function threadTitle(thread: Thread, currentUserId: number | null): string {
  const others = thread.participants.filter((p) => p.id !== currentUserId);
  return others.map((p) => p.username).join(', ') || 'Just you';
}

export default function MessagesPage() {
  const { data, loading, error, accept } = useThreads();
  const [selected, setSelected] = useState<number | undefined>(undefined);
  const [currentUserId, setCurrentUserId] = useState<number | null>(null);

  useEffect(() => {
    apiFetch<{ id: number }>('/api/users/me')
      .then((me) => setCurrentUserId(me.id))
      .catch(() => setCurrentUserId(null));
  }, []);

  if (loading && !data) return <p className="text-sm text-muted-foreground">Loading…</p>;
  if (error) return <p className="text-sm text-red-600">{error}</p>;

  return (
    <div className="grid h-[70vh] grid-cols-[14rem_1fr] overflow-hidden rounded-lg border border-border">
      <aside className="overflow-y-auto border-r border-border">
        <h2 className="px-3 pt-3 text-xs font-semibold uppercase text-muted-foreground">Inbox</h2>
        <ul>
          {data?.inbox.map((t) => (
            <li key={t.id}>
              <button
                type="button"
                onClick={() => setSelected(t.id)}
                className={`w-full px-3 py-2 text-left text-sm hover:bg-muted ${selected === t.id ? 'bg-muted' : ''}`}
              >
                {threadTitle(t, currentUserId)}
                {t.last_message && (
                  <span className="block truncate text-xs text-muted-foreground">{t.last_message.text}</span>
                )}
              </button>
            </li>
          ))}
        </ul>
        {data && data.requests.length > 0 && (
          <>
            <h2 className="px-3 pt-3 text-xs font-semibold uppercase text-muted-foreground">Requests</h2>
            <ul>
              {data.requests.map((t) => (
                <li key={t.id} className="flex items-center justify-between px-3 py-2 text-sm">
                  {threadTitle(t, currentUserId)}
                  <button type="button" onClick={() => accept(t.id)} className="text-xs text-primary">
                    Accept
                  </button>
                </li>
              ))}
            </ul>
          </>
        )}
      </aside>
      {selected !== undefined ? (
        <ErrorBoundary title="Chat failed to render">
          <ThreadView threadId={selected} currentUserId={currentUserId} />
        </ErrorBoundary>
      ) : (
        <p className="m-auto text-sm text-muted-foreground">Pick a conversation</p>
      )}
    </div>
  );
}
