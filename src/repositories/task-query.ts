// =============================================================================
// repositories/task-query.ts
//   Filtered, paginated, counted task listing.
//
//   Filters combine with AND; the tag filter is an OR over its names.
//   is_deleted = 0 is not a filter the caller can switch off — it is always
//   the first condition.
//   Tag matching uses EXISTS rather than a JOIN, so a task carrying two of the
//   requested tags still comes back once and is counted once.
// =============================================================================

import { hydrate, mapTaskRow } from "./task.repository";
import type { TaskDb } from "../db";
import type { TaskFilters, Pagination, TaskListResult } from "../types/task.types";

export interface TaskFilterClause {
  where:    string;
  bindings: unknown[];
}

// Builds a dynamic WHERE clause from filters — all values go through bind()
export function buildTaskFilter(filters: TaskFilters): TaskFilterClause {
  const conditions: string[] = ["t.is_deleted = 0"];
  const bindings:   unknown[] = [];

  if (filters.completed !== undefined) {
    conditions.push("t.completed = ?");
    bindings.push(filters.completed ? 1 : 0);
  }

  if (filters.priority !== undefined) {
    conditions.push("t.priority = ?");
    bindings.push(filters.priority);
  }

  if (filters.tags && filters.tags.length > 0) {
    conditions.push(`
      EXISTS (
        SELECT 1
        FROM task_tags tt
        JOIN tags g ON g.id = tt.tag_id
        WHERE tt.task_id = t.id
          AND g.name IN (${filters.tags.map(() => "?").join(", ")})
      )`);
    bindings.push(...filters.tags);
  }

  return { where: conditions.join(" AND "), bindings };
}

// ─── findAll ──────────────────────────────────────────────────────────────────
// Newest first; id breaks created_at ties so consecutive pages never overlap.
// Count and page are read inside one transaction to see the same snapshot.

export function findAll(
  db:         TaskDb,
  filters:    TaskFilters,
  pagination: Pagination
): TaskListResult {
  const { where, bindings } = buildTaskFilter(filters);

  const read = db.transaction((): TaskListResult => {
    const countRow = db
      .prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM tasks t WHERE ${where}`)
      .get(...bindings);

    const rows = db
      .prepare<unknown[], Record<string, unknown>>(`
        SELECT t.*
        FROM tasks t
        WHERE ${where}
        ORDER BY t.created_at DESC, t.id DESC
        LIMIT ? OFFSET ?
      `)
      .all(...bindings, pagination.limit, pagination.offset);

    return {
      items: hydrate(db, rows.map(mapTaskRow)),
      total: countRow?.total ?? 0,
    };
  });

  return read();
}
