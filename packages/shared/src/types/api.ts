import type { EngineError } from "@ipd/engine-core";

/** Engine codes plus the codes the API layer raises itself. */
export type ApiErrorCode = `${EngineError}` | "VALIDATION_ERROR" | "INTERNAL_ERROR" | "BAD_REQUEST";

/** Error payload of a failed API call. */
export interface ApiError {
  code: ApiErrorCode;
  message: string;
  details?: unknown;
}

/** Envelope for every REST response. */
export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: ApiError };
