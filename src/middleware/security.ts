// =============================================================================
// middleware/security.ts
//
//   1. addSecurityHeaders  — full header set (CSP, HSTS, referrer, permissions)
//   2. handleCors          — CORS preflight for OPTIONS
// =============================================================================

import { preflight } from "../utils/response";

// ─── 1. Security headers ──────────────────────────────────────────────────────
// Returns a NEW Response with all security headers added.

export function addSecurityHeaders(response: Response): Response {
  const newHeaders = new Headers(response.headers);

  newHeaders.set("X-Content-Type-Options", "nosniff");
  newHeaders.set("X-Frame-Options", "DENY");
  newHeaders.set("Strict-Transport-Security", "max-age=63072000; includeSubDomains; preload");

  // API only serves JSON, no scripts or styles needed
  newHeaders.set(
    "Content-Security-Policy",
    "default-src 'none'; frame-ancestors 'none'"
  );

  newHeaders.set("Referrer-Policy", "strict-origin-when-cross-origin");
  newHeaders.set(
    "Permissions-Policy",
    "geolocation=(), microphone=(), camera=(), payment=()"
  );

  newHeaders.delete("Server");

  return new Response(response.body, {
    status:     response.status,
    statusText: response.statusText,
    headers:    newHeaders,
  });
}

// ─── 2. CORS ──────────────────────────────────────────────────────────────────
// Returns a preflight response for OPTIONS, or null to continue the request.

export function handleCors(request: Request): Response | null {
  if (request.method === "OPTIONS") {
    return preflight();
  }
  return null;
}
