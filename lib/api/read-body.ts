/**
 * Read a request body as a flat record, whether it was sent as JSON,
 * multipart form data or a urlencoded form. Unparseable bodies read as {}.
 */

import type { NextRequest } from "next/server";

export type RequestBody = Record<string, unknown>;

function isRecord(value: unknown): value is RequestBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readBody(request: NextRequest): Promise<RequestBody> {
  const contentType = request.headers.get("content-type") ?? "";

  if (
    contentType.includes("multipart/form-data") ||
    contentType.includes("application/x-www-form-urlencoded")
  ) {
    const form = await request.formData();
    const body: RequestBody = {};
    for (const [key, value] of form.entries()) body[key] = value;
    return body;
  }

  const text = await request.text();
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/** Uploaded file field, or null when absent or not a file. */
export function fileField(body: RequestBody, name: string): File | null {
  const value = body[name];
  return value instanceof File && value.size > 0 ? value : null;
}
