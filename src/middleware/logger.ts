// =============================================================================
// middleware/logger.ts
//   - Structured JSON: every field is a key, one line per request
//   - Request ID taken from X-Request-ID (set by a proxy) or generated, and
//     echoed back in the response header for tracing
//   - Log level: "info" for normal, "warn" for 4xx, "error" for 5xx
// =============================================================================

import { randomUUID } from "node:crypto";
import { log } from "../utils/log";

export async function logWithTiming(
  request: Request,
  handler: () => Promise<Response>
): Promise<Response> {
  const start     = Date.now();
  const requestId = request.headers.get("X-Request-ID") ?? randomUUID();

  const response  = await handler();
  const duration  = Date.now() - start;
  const status    = response.status;

  const level =
    status >= 500 ? "error" :
    status >= 400 ? "warn"  :
    "info";

  log(level, {
    request_id:  requestId,
    method:      request.method,
    path:        new URL(request.url).pathname,
    status,
    duration_ms: duration,
    user_agent:  request.headers.get("User-Agent") ?? "",
  });

  // Copy rather than mutate: headers of a Response built elsewhere may be immutable
  const newHeaders = new Headers(response.headers);
  newHeaders.set("X-Request-ID", requestId);

  return new Response(response.body, {
    status:     response.status,
    statusText: response.statusText,
    headers:    newHeaders,
  });
}
