'use client';

import Link from 'next/link';
import { Camera, Home, MessageSquare, Trophy, LogIn } from 'lucide-react';

export function SiteHeader() {
  return (
    <header className="sticky top-0 z-40 border-b border-border bg-background/90 backdrop-blur">
      <nav className="mx-auto flex max-w-3xl items-center gap-6 px-4 py-3 text-sm">
        <Link href="/" className="mr-auto inline-flex items-center gap-2 font-semibold">
          <Camera className="h-5 w-5" />
          Shutterbug
        </Link>
        <Link href="/" aria-label="Feed"><Home className="h-4 w-4" /></Link>
        <Link href="/messages" aria-label="Messages"><MessageSquare className="h-4 w-4" /></Link>
        <Link href="/leaderboard" aria-label="Leaderboard"><Trophy className="h-4 w-4" /></Link>
        <Link href="/login" aria-label="Sign in"><LogIn className="h-4 w-4" /></Link>
      </nav>
    </header>
  );
}
