// =============================================================================
// utils/response.ts
//   - Generic typed envelope: { success, data } | { success, error }
//   - Single source of truth for every HTTP response in the app
//   - CORS headers on every response (required for browser clients)
//   - Named helpers: ok(), created(), badRequest(), etc. — no magic status numbers
// =============================================================================

// ─── Response envelope types ──────────────────────────────────────────────────

export interface SuccessResponse<T> {
  success: true;
  data:    T;
}

// Field-level messages keyed by field name, e.g. { priority: "priority must be between 1 and 5" }
export type FieldErrors = Record<string, string>;

export interface ErrorResponse {
  success: false;
  error: {
    code:     string;
    message:  string;
    details?: FieldErrors;
  };
}

export type ApiResponse<T> = SuccessResponse<T> | ErrorResponse;

// ─── CORS headers ─────────────────────────────────────────────────────────────
// The security middleware handles the preflight OPTIONS separately.

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin":  "*",
  "Access-Control-Allow-Methods": "GET, POST, PATCH, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, X-Request-ID",
  "Access-Control-Max-Age":       "86400",
};

// ─── Core builder ─────────────────────────────────────────────────────────────

function buildResponse<T>(body: ApiResponse<T>, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
      ...CORS_HEADERS,
    },
  });
}

function errorResponse(status: number, code: string, message: string, details?: FieldErrors): Response {
  return buildResponse<never>(
    { success: false, error: { code, message, ...(details ? { details } : {}) } },
    status
  );
}

// ─── Success helpers ──────────────────────────────────────────────────────────

/** 200 OK */
export function ok<T>(data: T): Response {
  return buildResponse<T>({ success: true, data }, 200);
}

/** 201 Created */
export function created<T>(data: T): Response {
  return buildResponse<T>({ success: true, data }, 201);
}

/** 204 No Content — e.g. after DELETE */
export function noContent(): Response {
  return new Response(null, {
    status: 204,
    headers: CORS_HEADERS,
  });
}

// ─── Error helpers ────────────────────────────────────────────────────────────

export function badRequest(message: string, code = "BAD_REQUEST"): Response {
  return errorResponse(400, code, message);
}

export function notFound(message = "Not found"): Response {
  return errorResponse(404, "NOT_FOUND", message);
}

export function conflict(message: string): Response {
  return errorResponse(409, "CONFLICT", message);
}

/** 422 — request was well-formed JSON but one or more fields are invalid */
export function validationFailed(details: FieldErrors, message = "Validation Failed"): Response {
  return errorResponse(422, "VALIDATION_FAILED", message, details);
}

export function internalError(message = "Internal server error"): Response {
  return errorResponse(500, "INTERNAL_ERROR", message);
}

/** CORS preflight response for OPTIONS requests */
export function preflight(): Response {
  return new Response(null, {
    status: 204,
    headers: CORS_HEADERS,
  });
}
