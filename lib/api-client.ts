/**
 * Browser-side API access. The auth token lives in localStorage and is sent
 * as `Authorization: Token <key>`.
 */

import { toast } from "sonner";
import { isApiError } from "@/lib/api/error-types";

const TOKEN_STORAGE_KEY = "shutterbug_token";

export function getStoredToken(): string | null {
  if (typeof window === "undefined") return null;
  return localStorage.getItem(TOKEN_STORAGE_KEY);
}

export function setStoredToken(token: string | null): void {
  if (typeof window === "undefined") return;
  if (token) localStorage.setItem(TOKEN_STORAGE_KEY, token);
  else localStorage.removeItem(TOKEN_STORAGE_KEY);
}

export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: unknown
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

/** Fields every bug-detector response carries. */
export interface CtfResult {
  vulnerability_detected: true;
  notification_type?: "success" | "info" | "warning";
  ctf_message?: string;
  ctf_points_awarded?: number;
  ctf_total_points?: number;
  flag?: string | null;
  bug_type?: string;
  bug_title?: string;
  description?: string;
  warning_message?: string;
}

export function isCtfResult(body: unknown): body is CtfResult {
  return (
    typeof body === "object" &&
    body !== null &&
    "vulnerability_detected" in body &&
    body.vulnerability_detected === true
  );
}

type CtfListener = (result: CtfResult) => void;
const ctfListeners = new Set<CtfListener>();

/** Called with every CTF body any request receives. Returns the unsubscribe function. */
export function onCtfResult(listener: CtfListener): () => void {
  ctfListeners.add(listener);
  return () => {
    ctfListeners.delete(listener);
  };
}

function errorMessage(body: unknown, status: number): string {
  if (isApiError(body)) return body.message;
  return `Request failed (${status})`;
}

/**
 * fetch() with the stored token. Resolves with the parsed body on 2xx,
 * throws ApiRequestError otherwise, and for a 2xx body that is not JSON.
 * CTF bodies are broadcast to onCtfResult listeners whatever the status.
 */
export async function apiFetch<T>(path: string, init: RequestInit = {}): Promise<T> {
  const headers = new Headers(init.headers);
  const token = getStoredToken();
  if (token) headers.set("Authorization", `Token ${token}`);
  if (typeof init.body === "string" && !headers.has("Content-Type")) {
    headers.set("Content-Type", "application/json");
  }

  const res = await fetch(path, { ...init, headers });
  const text = await res.text();
  let body: unknown = null;
  if (text) {
    try {
      body = JSON.parse(text);
    } catch {
      body = text;
    }
  }

  if (isCtfResult(body)) {
    const result = body;
    ctfListeners.forEach((listener) => listener(result));
  }

  if (!res.ok) {
    const message = errorMessage(body, res.status);
    if (res.status >= 500) toast.error(message);
    throw new ApiRequestError(message, res.status, body);
  }
  try {
    return JSON.parse(text || "null");
  } catch {
    throw new ApiRequestError("Invalid JSON response", res.status, text);
  }
}
