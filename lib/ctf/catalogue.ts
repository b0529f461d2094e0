/**
 * The planted bugs players can find. Slugs are stable identifiers; titles are
 * what players see in award messages and on the bug list.
 */

import type { BugCategory } from "@/lib/db/types";

export type BugSlug =
  | "privilege-escalation"
  | "private-post-viewing"
  | "idor-chat-messages"
  | "race-condition-saves"
  | "xss-comments"
  | "login-rate-limit"
  | "reset-invalid-uid"
  | "reset-invalid-token"
  | "reset-malformed-token"
  | "reset-invalid-base64"
  | "reset-predictable-token";

export interface BugDefinition {
  slug: BugSlug;
  title: string;
  description: string;
  category: BugCategory;
  points: number;
  /** Flag body before the user id, e.g. `xss_comment_system` → `CTF{xss_comment_system_<uid>}`. */
  flagKey: string;
}

export const BUGS: readonly BugDefinition[] = [
  {
    slug: "privilege-escalation",
    title: "Privilege Escalation via API Endpoint",
    description: "A role-changing endpoint accepts requests from any signed-in user.",
    category: "security",
    points: 50,
    flagKey: "privilege_escalation_discovered",
  },
  {
    slug: "private-post-viewing",
    title: "Private Post Viewing",
    description: "Post images are served without checking the post's privacy setting.",
    category: "security",
    points: 100,
    flagKey: "private_post_viewing",
  },
  {
    slug: "idor-chat-messages",
    title: "IDOR in Chat Messages",
    description: "Chat threads can be read by id without a participant check.",
    category: "security",
    points: 75,
    flagKey: "idor_chat_messages",
  },
  {
    slug: "race-condition-saves",
    title: "Race Condition in Saved Posts",
    description: "The save toggle has no concurrency control and can be hammered.",
    category: "security",
    points: 50,
    flagKey: "race_condition_saved",
  },
  {
    slug: "xss-comments",
    title: "XSS in Comment System",
    description: "Comment text is checked for script injection only after submission.",
    category: "security",
    points: 75,
    flagKey: "xss_comment_system",
  },
  {
    slug: "login-rate-limit",
    title: "Missing Rate Limiting in Login",
    description: "The login endpoint allows unlimited failed attempts.",
    category: "security",
    points: 75,
    flagKey: "missing_rate_limiting_login",
  },
  {
    slug: "reset-invalid-uid",
    title: "Invalid Password Reset UID Format",
    description: "Reset links with an undecodable user id are processed instead of rejected.",
    category: "security",
    points: 100,
    flagKey: "invalid_reset_uid",
  },
  {
    slug: "reset-invalid-token",
    title: "Invalid Password Reset Token Format",
    description: "Reset tokens without the expected separator are processed instead of rejected.",
    category: "security",
    points: 100,
    flagKey: "invalid_reset_token",
  },
  {
    slug: "reset-malformed-token",
    title: "Malformed Password Reset Token",
    description: "Reset tokens made of bare separators are processed instead of rejected.",
    category: "security",
    points: 100,
    flagKey: "malformed_reset_token",
  },
  {
    slug: "reset-invalid-base64",
    title: "Invalid Base64 in Password Reset Token",
    description: "Reset tokens carrying broken base64 are processed instead of rejected.",
    category: "security",
    points: 100,
    flagKey: "invalid_base64_token",
  },
  {
    slug: "reset-predictable-token",
    title: "Predictable Password Reset Token",
    description: "Reset tokens embed the base64 username and can be forged for another account.",
    category: "security",
    points: 100,
    flagKey: "predictable_reset_token",
  },
];

const BY_SLUG = new Map<BugSlug, BugDefinition>(BUGS.map((b) => [b.slug, b]));

export function getBugDefinition(slug: BugSlug): BugDefinition {
  const def = BY_SLUG.get(slug);
  if (!def) throw new Error(`Unknown bug: ${slug}`);
  return def;
}

/** Reset-token bugs in the order a login claims them. */
export const RESET_BUG_SLUGS: readonly BugSlug[] = [
  "reset-invalid-uid",
  "reset-invalid-token",
  "reset-malformed-token",
  "reset-invalid-base64",
  "reset-predictable-token",
];

export function flagFor(slug: BugSlug, userId: number, ...suffix: Array<string | number>): string {
  const { flagKey } = getBugDefinition(slug);
  return `CTF{${[flagKey, userId, ...suffix].join("_")}}`;
}
