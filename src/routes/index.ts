// =============================================================================
// routes/index.ts  — Central router for all API endpoints
//
//   Pure routing only. Each route:
//     1. Parses the URL + method
//     2. Extracts any path params (e.g. id)
//     3. Calls one controller function
//     4. Returns the Response
// =============================================================================

import { notFound, ok } from "../utils/response";
import { AppError }            from "../middleware/error-handler";
import { handleListTasks,
         handleGetTask,
         handleCreateTask,
         handleUpdateTask,
         handleDeleteTask }    from "../controllers/task.controller";
import { handleListTags }      from "../controllers/tag.controller";
import type { Env }            from "../types/env.types";

export const API_VERSION = "1.0.0";

// ─── parseId ──────────────────────────────────────────────────────────────────
// Any integer is accepted; ids that match no live task (0, negatives) end in 404.
// Returns null if missing or not an integer.

export function parseId(segment: string | undefined): number | null {
  if (!segment || !/^-?\d+$/.test(segment)) return null;
  const n = parseInt(segment, 10);
  return Number.isSafeInteger(n) ? n : null;
}

// ─── Router ───────────────────────────────────────────────────────────────────

export async function router(request: Request, env: Env): Promise<Response> {
  const url    = new URL(request.url);
  const method = request.method;
  const path   = url.pathname;

  // "/tasks/42" → ["tasks", "42"]; a trailing slash is ignored
  const segments = path.split("/").filter(Boolean);
  const [seg1, seg2, ...rest] = segments;

  // ── Health check ─────────────────────────────────────────────────────────────
  if ((path === "/" || path === "/health") && method === "GET") {
    return ok({
      status:      "ok",
      timestamp:   new Date().toISOString(),
      version:     API_VERSION,
      environment: env.ENVIRONMENT,
    });
  }

  if (rest.length > 0) {
    return notFound(`Route not found: ${method} ${path}`);
  }

  // ── Task routes ───────────────────────────────────────────────────────────
  if (seg1 === "tasks") {
    // /tasks  (no id)
    if (seg2 === undefined) {
      if (method === "GET")  return handleListTasks(request, env);
      if (method === "POST") return handleCreateTask(request, env);
      return notFound(`Route not found: ${method} ${path}`);
    }

    // /tasks/:id
    const id = parseId(seg2);
    if (id === null) {
      throw AppError.badRequest("Task ID must be an integer");
    }

    if (method === "GET")    return handleGetTask(id, env);
    if (method === "PATCH")  return handleUpdateTask(id, request, env);
    if (method === "DELETE") return handleDeleteTask(id, env);
  }

  // ── Tag routes ────────────────────────────────────────────────────────────
  if (seg1 === "tags" && seg2 === undefined && method === "GET") {
    return handleListTags(env);
  }

  return notFound(`Route not found: ${method} ${path}`);
}
