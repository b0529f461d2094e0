/**
 * Consistent JSON response and error handling for API routes.
 */

import { API_ERROR_STATUS, type ApiError, type ApiErrorCode, type FieldErrors } from "./error-types";

export function json<T>(data: T, status = 200, init?: { headers?: Record<string, string> }): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      "Content-Type": "application/json",
      ...init?.headers,
    },
  });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function errorResponse(
  error: ApiErrorCode,
  message: string,
  details?: FieldErrors
): Response {
  const status = API_ERROR_STATUS[error];
  const body: ApiError = {
    error,
    message,
    ...(details && { details }),
  };
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export function validationError(
  message: string,
  details?: FieldErrors
): Response {
  return errorResponse("validation_failed", message, details);
}

export function unauthorizedError(
  message = "Authentication credentials were not provided."
): Response {
  return errorResponse("unauthorized", message);
}

export function forbiddenError(
  message = "You do not have permission to perform this action."
): Response {
  return errorResponse("forbidden", message);
}

export function notFoundError(message = "Resource not found"): Response {
  return errorResponse("not_found", message);
}

export function internalError(
  message = "An unexpected error occurred"
): Response {
  return errorResponse("internal_error", message);
}
