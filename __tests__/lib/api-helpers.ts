/**
 * Helpers for calling route handlers directly with a NextRequest.
 */

import { NextRequest } from "next/server";
import type { DbAdapter } from "@/lib/db/adapter";
import type { UserRow } from "@/lib/db/types";
import { getOrCreateToken } from "@/lib/auth/tokens";

export const BASE = "http://localhost:3000";

export interface RequestOptions {
  method?: string;
  token?: string;
  json?: unknown;
  form?: FormData;
  headers?: Record<string, string>;
}

export function makeRequest(path: string, opts: RequestOptions = {}): NextRequest {
  const headers = new Headers(opts.headers);
  if (opts.token) headers.set("Authorization", `Token ${opts.token}`);
  let body: BodyInit | undefined;
  if (opts.json !== undefined) {
    headers.set("Content-Type", "application/json");
    body = JSON.stringify(opts.json);
  } else if (opts.form) {
    body = opts.form;
  }
  return new NextRequest(`${BASE}${path}`, {
    method: opts.method ?? (body ? "POST" : "GET"),
    headers,
    body,
  });
}

export function params<T extends Record<string, string | string[]>>(value: T) {
  return { params: Promise.resolve(value) };
}

export async function readJson(res: Response): Promise<Record<string, unknown>> {
  return res.json();
}

export interface TestUser {
  user: UserRow;
  token: string;
}

/** Inserts a user with a throwaway hash and issues a token for it. */
export async function createUser(db: DbAdapter, username: string): Promise<TestUser> {
  const user = await db.insertUser({
    username,
    email: `${username}@example.com`,
    password_hash: "not-a-real-hash",
  });
  const token = await getOrCreateToken(db, user.id);
  return { user, token };
}

export async function createPost(
  db: DbAdapter,
  userId: number,
  opts: { caption?: string; isPrivate?: boolean; image?: string } = {}
) {
  return db.insertPost({
    user_id: userId,
    image: opts.image ?? "posts/test.jpg",
    caption: opts.caption ?? "",
    is_private: opts.isPrivate ?? false,
  });
}
