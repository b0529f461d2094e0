/**
 * Uploaded images live under <dataDir>/media. Rows store the path relative
 * to that root, e.g. `posts/3f1c….png`.
 */

import * as fs from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import { getMediaDir } from "@/lib/config/data-dir";
import { MAX_IMAGE_BYTES } from "@/lib/config/settings";

const IMAGE_TYPES: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
};

export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadError";
  }
}

/** Validates and writes an uploaded image, returning its media-relative path. */
export async function storeImage(file: File, folder: "posts" | "profile_pictures"): Promise<string> {
  if (file.size > MAX_IMAGE_BYTES) {
    throw new UploadError("Image file too large. Maximum size is 10MB.");
  }
  const ext = IMAGE_TYPES[file.type];
  if (!ext) {
    throw new UploadError("Unsupported image format. Please use JPEG, PNG, or GIF.");
  }

  const relative = `${folder}/${randomUUID()}${ext}`;
  const target = path.join(getMediaDir(), relative);
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, Buffer.from(await file.arrayBuffer()));
  return relative;
}

/** Absolute path for a media-relative path, or null if it escapes the media root. */
export function resolveMediaPath(relative: string): string | null {
  const root = path.resolve(getMediaDir());
  const target = path.resolve(root, relative);
  if (target !== root && target.startsWith(root + path.sep)) return target;
  return null;
}

export function contentTypeFor(filePath: string): string {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".png")) return "image/png";
  if (lower.endsWith(".gif")) return "image/gif";
  return "image/jpeg";
}

export async function readMedia(relative: string): Promise<{ data: Buffer; contentType: string } | null> {
  const absolute = resolveMediaPath(relative);
  if (!absolute) return null;
  try {
    const data = await fs.promises.readFile(absolute);
    return { data, contentType: contentTypeFor(absolute) };
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}
