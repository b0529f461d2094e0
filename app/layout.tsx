import React from "react"
import type { Metadata } from 'next'
import { Toaster } from 'sonner'
import { ErrorBoundary } from '@/components/error-boundary'
import { SiteHeader } from '@/components/social/site-header'
import { FlagPopupHost } from '@/components/social/flag-popup'
import './globals.css'

export const metadata: Metadata = {
  title: 'Shutterbug',
  description: 'Share photos, follow friends, and hunt for the bugs hidden in the app.',
}

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode
}>) {
  return (
    <html lang="en">
      <body className="font-sans antialiased">
        <SiteHeader />
        <ErrorBoundary title="Something went wrong">
          <main className="mx-auto max-w-3xl px-4 py-6">{children}</main>
        </ErrorBoundary>
        <FlagPopupHost />
        <Toaster richColors position="top-right" />
      </body>
    </html>
  )
}
