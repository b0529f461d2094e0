/**
 * Script-injection attempts in user text, and escaping for what gets stored.
 */

const XSS_PATTERNS: readonly RegExp[] = [
  /<script\b/i,
  /javascript\s*:/i,
  /\bon[a-z]+\s*=/i,
  /<iframe\b/i,
  /<img\b[^>]*\bonerror\b/i,
  /<svg\b[^>]*\bonload\b/i,
  /document\s*\.\s*cookie/i,
  /\balert\s*\(/i,
  /\beval\s*\(/i,
];

export function detectXssAttempt(text: string): boolean {
  return XSS_PATTERNS.some((re) => re.test(text));
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** What the player sent, capped at 100 characters for echoing back. */
export function payloadPreview(text: string, max = 100): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
