import Link from 'next/link';

export default function NotFound() {
  return (
    <div className="flex flex-col items-center justify-center py-24">
      <h1 className="mb-2 text-2xl font-bold text-foreground">Nothing here</h1>
      <p className="mb-6 text-sm text-muted-foreground">This page could not be found.</p>
      <Link href="/" className="text-sm font-medium text-primary hover:underline">
        Back to the feed
      </Link>
    </div>
  );
}
