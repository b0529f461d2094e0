/**
 * Zod schemas for API request payload validation.
 */

import * as z from "zod";
import type { FieldErrors } from "@/lib/api/error-types";
import { MAX_CAPTION_LENGTH } from "@/lib/config/settings";

const requiredText = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message);

// Auth
export const registerSchema = z.object({
  username: requiredText("Username is required.").pipe(
    z
      .string()
      .max(150, "Username must be at most 150 characters.")
      .regex(/^[\w.@+-]+$/, "Username may contain only letters, digits and @/./+/-/_.")
  ),
  email: requiredText("Email is required.").pipe(z.string().email("Enter a valid email address.")),
  password: z
    .string({ required_error: "Password is required." })
    .min(6, "Password must be at least 6 characters long."),
});

export const loginSchema = z.object({
  username: requiredText("Username and password are required."),
  password: z
    .string({ required_error: "Username and password are required." })
    .min(1, "Username and password are required."),
});

export const forgotPasswordSchema = z.object({
  email: requiredText("Email is required."),
});

export const resetPasswordSchema = z.object({
  new_password: z
    .string({ required_error: "New password is required." })
    .min(1, "New password is required.")
    .min(6, "Password must be at least 6 characters long."),
});

// Users
export const updateProfileSchema = z.object({
  bio: z.string().max(500, "Bio must be at most 500 characters.").optional(),
});

export const userSearchSchema = z.object({
  search: requiredText("Search query is required."),
});

export const setRoleSchema = z.object({
  role: z.string().default(""),
});

// Posts
export const createPostSchema = z.object({
  caption: z.string().max(MAX_CAPTION_LENGTH, `Caption must be at most ${MAX_CAPTION_LENGTH} characters.`).default(""),
  is_private: z
    .union([z.boolean(), z.enum(["true", "false", "1", "0", "on", "off", ""])])
    .default(false)
    .transform((v) => v === true || v === "true" || v === "1" || v === "on"),
});

// Comments
export const createCommentSchema = z.object({
  post: z.coerce.number({ invalid_type_error: "post must be a post id." }).int().positive(),
  // Length and emptiness are checked after the script-payload check runs.
  text: z.string({ required_error: "Comment text is required." }),
});

// Messages
export const startThreadSchema = z.object({
  receiver_id: z.coerce
    .number({ required_error: "receiver_id is required.", invalid_type_error: "receiver_id is required." })
    .int()
    .positive("receiver_id is required."),
});

export const createMessageSchema = z.object({
  text: requiredText("Message text is required.").pipe(
    z.string().max(2000, "Message must be at most 2000 characters.")
  ),
});

// Query strings
export const pageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).catch(1),
});

export const idParamSchema = z.coerce.number().int().positive();

/**
 * Issues grouped by the request field they belong to, for the `details` of a
 * 400. Issues about the body itself land under `non_field_errors`.
 */
export function fieldErrors(error: z.ZodError): FieldErrors {
  const grouped: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join(".") : "non_field_errors";
    (grouped[field] ??= []).push(issue.message);
  }
  return grouped;
}
