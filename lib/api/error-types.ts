/**
 * The error envelope every route answers with: `{ error, message, details? }`.
 * Login failures and CTF finds add their own fields next to these.
 */

export const API_ERROR_STATUS = {
  validation_failed: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  internal_error: 500,
} as const;

export type ApiErrorCode = keyof typeof API_ERROR_STATUS;

/** Messages keyed by request field; `non_field_errors` for the body as a whole. */
export type FieldErrors = Record<string, string[]>;

export interface ApiError {
  error: ApiErrorCode;
  message: string;
  details?: FieldErrors;
}

export function isApiErrorCode(value: unknown): value is ApiErrorCode {
  return typeof value === "string" && value in API_ERROR_STATUS;
}

export function isApiError(value: unknown): value is ApiError {
  return (
    typeof value === "object" &&
    value !== null &&
    "error" in value &&
    isApiErrorCode(value.error) &&
    "message" in value &&
    typeof value.message === "string"
  );
}
