/**
 * Feature flags for the capture-the-flag layer.
 * Read from env on every call so a running process (or a test) can flip them.
 */

/** Exploit detectors and point awarding. Default: true. */
export function isCtfEnabled(): boolean {
  return process.env.CTF_ENABLED !== "false";
}

/** Debug listing of every chat thread (IDOR breadcrumb). Default: true. */
export function isCtfDebugEnabled(): boolean {
  return isCtfEnabled() && process.env.CTF_DEBUG_ENDPOINTS !== "false";
}
