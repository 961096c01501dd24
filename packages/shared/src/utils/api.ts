import type { ApiErrorCode, ApiResponse } from "../types/api.js";

/** Success envelope around `data`. */
export function createApiResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

/** Failure envelope. `details` carries validation issues where there are any. */
export function createApiError(code: ApiErrorCode, message: string, details?: unknown): ApiResponse<never> {
  return details === undefined
    ? { success: false, error: { code, message } }
    : { success: false, error: { code, message, details } };
}
