// =============================================================================
// index.ts  — fetch handler: (Request, Env) → Response
//
//   Served over HTTP by server.ts; tests call it directly.
//
//   Request arrives
//       ↓
//   handleCors           — OPTIONS preflight → 204, or continue
//       ↓
//   logWithTiming        — records method/path/status/duration
//       ↓
//   withErrorHandling    — turns AppError / unexpected throws into JSON errors
//       ↓
//   router               — routes to correct controller
//       ↓
//   addSecurityHeaders   — wraps response with all security headers
//       ↓
//   Response sent
// =============================================================================

import { withErrorHandling }     from "./middleware/error-handler";
import { logWithTiming }         from "./middleware/logger";
import {
  addSecurityHeaders,
  handleCors,
}                                from "./middleware/security";
import { router }                from "./routes/index";
import type { Env }              from "./types/env.types";

export default {
  async fetch(request: Request, env: Env): Promise<Response> {
    // CORS preflight — answered before routing, never logged as a 404
    const corsResponse = handleCors(request);
    if (corsResponse) return addSecurityHeaders(corsResponse);

    // Error boundary sits inside the timing wrapper so failed requests are logged too
    const response = await logWithTiming(request, () =>
      withErrorHandling(() => router(request, env))
    );

    return addSecurityHeaders(response);
  },
};
