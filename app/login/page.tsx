'use client';

import { useState, type FormEvent } from 'react';
import { useRouter } from 'next/navigation';
import { toast } from 'sonner';
import { apiFetch, setStoredToken } from '@/lib/api-client';

interface AuthResponse {
  token: string;
  user_id: number;
  username: string;
}

type Mode = 'login' | 'register';

export default function LoginPage() {
  const router = useRouter();
  const [mode, setMode] = useState<Mode>('login');
  const [username, setUsername] = useState('');
  const [email, setEmail] = useState('');
  const [password, setPassword] = useState('');
  const [busy, setBusy] = useState(false);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();
    setBusy(true);
    try {
      const body = mode === 'login' ? { username, password } : { username, email, password };
      const res = await apiFetch<AuthResponse>(`/api/auth/${mode}`, {
        method: 'POST',
        body: JSON.stringify(body),
      });
      setStoredToken(res.token);
      toast.success(`Signed in as ${res.username}`);
      router.push('/');
    } catch (err) {
      toast.error(err instanceof Error ? err.message : 'Sign in failed');
    } finally {
      setBusy(false);
    }
  };

  return (
    <form onSubmit={handleSubmit} className="mx-auto mt-12 flex max-w-sm flex-col gap-3">
      <h1 className="text-xl font-semibold">{mode === 'login' ? 'Sign in' : 'Create an account'}</h1>
      <input
        value={username}
        onChange={(e) => setUsername(e.target.value)}
        placeholder="Username"
        aria-label="Username"
        autoComplete="username"
        className="rounded-md border border-border px-3 py-2 text-sm"
      />
      {mode === 'register' && (
        <input
          type="email"
          value={email}
          onChange={(e) => setEmail(e.target.value)}
          placeholder="Email"
          aria-label="Email"
          className="rounded-md border border-border px-3 py-2 text-sm"
        />
      )}
      <input
        type="password"
        value={password}
        onChange={(e) => setPassword(e.target.value)}
        placeholder="Password"
        aria-label="Password"
        autoComplete={mode === 'login' ? 'current-password' : 'new-password'}
        className="rounded-md border border-border px-3 py-2 text-sm"
      />
      <button
        type="submit"
        disabled={busy}
        className="rounded-md bg-primary px-3 py-2 text-sm font-medium text-white disabled:opacity-50"
      >
        {mode === 'login' ? 'Sign in' : 'Sign up'}
      </button>
      <button
        type="button"
        onClick={() => setMode(mode === 'login' ? 'register' : 'login')}
        className="text-xs text-muted-foreground hover:underline"
      >
        {mode === 'login' ? 'No account yet? Sign up' : 'Already registered? Sign in'}
      </button>
    </form>
  );
}
