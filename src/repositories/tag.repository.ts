// =============================================================================
// repositories/tag.repository.ts
//   Tags are global and created lazily: the first task that references a name
//   creates its row, later tasks reuse it. Tags are never deleted.
// =============================================================================

import type { TaskDb } from "../db";
import type { Tag } from "../types/task.types";

function mapRow(row: Record<string, unknown>): Tag {
  return {
    id:   Number(row.id),
    name: String(row.name),
  };
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ");
}

export function findAll(db: TaskDb): Tag[] {
  return db
    .prepare<[], Record<string, unknown>>("SELECT id, name FROM tags ORDER BY name ASC")
    .all()
    .map(mapRow);
}

// ─── resolve ──────────────────────────────────────────────────────────────────
// Get-or-create for already-normalized names (trimmed, lowercase, unique).
// INSERT … ON CONFLICT DO NOTHING is atomic, so there is no window between
// "look up" and "insert" for a concurrent writer to slip into.
// The returned order does not follow `names`.

export function resolve(db: TaskDb, names: readonly string[]): Tag[] {
  if (names.length === 0) return [];

  const insert = db.prepare<[string]>(
    "INSERT INTO tags (name) VALUES (?) ON CONFLICT (name) DO NOTHING"
  );
  for (const name of names) {
    insert.run(name);
  }

  return db
    .prepare<string[], Record<string, unknown>>(
      `SELECT id, name FROM tags WHERE name IN (${placeholders(names.length)})`
    )
    .all(...names)
    .map(mapRow);
}

// ─── findByTaskIds ────────────────────────────────────────────────────────────
// Tag sets for a batch of tasks in one query. Every requested id gets an entry,
// empty when the task has no tags.

export function findByTaskIds(
  db:      TaskDb,
  taskIds: readonly number[]
): Map<number, Tag[]> {
  const byTask = new Map<number, Tag[]>(taskIds.map((id): [number, Tag[]] => [id, []]));
  if (taskIds.length === 0) return byTask;

  const rows = db
    .prepare<number[], Record<string, unknown>>(`
      SELECT tt.task_id, t.id, t.name
      FROM task_tags tt
      JOIN tags t ON t.id = tt.tag_id
      WHERE tt.task_id IN (${placeholders(taskIds.length)})
      ORDER BY t.name ASC
    `)
    .all(...taskIds);

  for (const row of rows) {
    byTask.get(Number(row.task_id))?.push(mapRow(row));
  }

  return byTask;
}
