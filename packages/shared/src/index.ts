// ─── Shared Types ────────────────────────────────────────────
export type { ApiResponse, ApiError, ApiErrorCode } from "./types/api.js";

// ─── Utilities ───────────────────────────────────────────────
export { createApiResponse, createApiError } from "./utils/api.js";
