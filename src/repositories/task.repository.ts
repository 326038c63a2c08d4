// =============================================================================
// repositories/task.repository.ts
//
//   - "Live" means is_deleted = 0: findById/update/softDelete never see a
//     soft-deleted row
//   - Every write runs in one better-sqlite3 transaction: the task row and
//     its task_tags rows change together or not at all
//   - Missing rows come back as null/false; the service layer decides that
//     this means 404
//   - Explicit row mapper — no unsafe casts
// =============================================================================

import * as tagRepo from "./tag.repository";
import type { TaskDb } from "../db";
import type { Task, TaskRow, CreateTaskInput, UpdateTaskInput } from "../types/task.types";

// ─── Row mappers ──────────────────────────────────────────────────────────────

export function mapTaskRow(row: Record<string, unknown>): TaskRow {
  return {
    id:          Number(row.id),
    title:       String(row.title),
    description: row.description != null ? String(row.description) : null,
    priority:    Number(row.priority),
    due_date:    String(row.due_date),
    completed:   Number(row.completed) === 1,
    is_deleted:  Number(row.is_deleted) === 1,
    deleted_at:  row.deleted_at != null ? String(row.deleted_at) : null,
    created_at:  String(row.created_at),
    updated_at:  String(row.updated_at),
  };
}

// Attach tag sets to a page of rows — one query for the whole batch
export function hydrate(db: TaskDb, rows: readonly TaskRow[]): Task[] {
  const tagsByTask = tagRepo.findByTaskIds(db, rows.map((row) => row.id));
  return rows.map((row) => ({ ...row, tags: tagsByTask.get(row.id) ?? [] }));
}

function nowIso(): string {
  return new Date().toISOString();
}

// ─── findById ─────────────────────────────────────────────────────────────────

function findRow(db: TaskDb, id: number, includeDeleted: boolean): TaskRow | null {
  const sql = includeDeleted
    ? "SELECT * FROM tasks WHERE id = ?"
    : "SELECT * FROM tasks WHERE id = ? AND is_deleted = 0";

  const row = db.prepare<[number], Record<string, unknown>>(sql).get(id);
  return row ? mapTaskRow(row) : null;
}

export function findById(db: TaskDb, id: number): Task | null {
  const row = findRow(db, id, false);
  return row ? hydrate(db, [row])[0] ?? null : null;
}

// Soft-deleted rows included — for audits and tests, never exposed over HTTP
export function findByIdIncludingDeleted(db: TaskDb, id: number): Task | null {
  const row = findRow(db, id, true);
  return row ? hydrate(db, [row])[0] ?? null : null;
}

// ─── Tag association helpers ──────────────────────────────────────────────────

function attachTags(db: TaskDb, taskId: number, tagIds: readonly number[]): void {
  const insert = db.prepare<[number, number]>(
    "INSERT OR IGNORE INTO task_tags (task_id, tag_id) VALUES (?, ?)"
  );
  for (const tagId of tagIds) {
    insert.run(taskId, tagId);
  }
}

function clearTags(db: TaskDb, taskId: number): void {
  db.prepare<[number]>("DELETE FROM task_tags WHERE task_id = ?").run(taskId);
}

// The task ends with exactly `names`: rows outside the new set are removed,
// missing ones added, rows already present are left untouched.
function replaceTags(db: TaskDb, taskId: number, names: readonly string[]): void {
  const tagIds = tagRepo.resolve(db, names).map((tag) => tag.id);

  if (tagIds.length === 0) {
    clearTags(db, taskId);
    return;
  }

  db.prepare<number[]>(
    `DELETE FROM task_tags WHERE task_id = ? AND tag_id NOT IN (${tagIds.map(() => "?").join(", ")})`
  ).run(taskId, ...tagIds);

  attachTags(db, taskId, tagIds);
}

// ─── create ───────────────────────────────────────────────────────────────────

export function create(db: TaskDb, input: CreateTaskInput): Task {
  const insert = db.transaction((): Task | null => {
    const timestamp = nowIso();

    const result = db
      .prepare<[string, string | null, number, string, string, string]>(`
        INSERT INTO tasks (title, description, priority, due_date, completed, is_deleted, created_at, updated_at)
        VALUES (?, ?, ?, ?, 0, 0, ?, ?)
      `)
      .run(
        input.title,
        input.description ?? null,
        input.priority,
        input.due_date,
        timestamp,
        timestamp,
      );

    const taskId = Number(result.lastInsertRowid);

    if (input.tags.length > 0) {
      const tags = tagRepo.resolve(db, input.tags);
      attachTags(db, taskId, tags.map((tag) => tag.id));
    }

    return findById(db, taskId);
  });

  const task = insert();
  if (!task) throw new Error("Failed to retrieve task after insert");

  return task;
}

// ─── update ───────────────────────────────────────────────────────────────────
// Only fields present in `input` are written. updated_at moves forward on every
// call, even an empty patch; max() keeps it from going backwards if the clock does.

export function update(db: TaskDb, id: number, input: UpdateTaskInput): Task | null {
  const apply = db.transaction((): Task | null => {
    if (!findRow(db, id, false)) return null;

    const setClauses: string[] = ["updated_at = max(updated_at, ?)"];
    const bindings: unknown[] = [nowIso()];

    if (input.title !== undefined) {
      setClauses.push("title = ?");
      bindings.push(input.title);
    }

    if (input.description !== undefined) {
      setClauses.push("description = ?");
      bindings.push(input.description);
    }

    if (input.priority !== undefined) {
      setClauses.push("priority = ?");
      bindings.push(input.priority);
    }

    if (input.due_date !== undefined) {
      setClauses.push("due_date = ?");
      bindings.push(input.due_date);
    }

    if (input.completed !== undefined) {
      setClauses.push("completed = ?");
      bindings.push(input.completed ? 1 : 0);
    }

    db.prepare<unknown[]>(`UPDATE tasks SET ${setClauses.join(", ")} WHERE id = ? AND is_deleted = 0`)
      .run(...bindings, id);

    switch (input.tags.kind) {
      case "set":
        replaceTags(db, id, input.tags.names);
        break;
      case "clear":
        clearTags(db, id);
        break;
      case "absent":
        break;
    }

    return findById(db, id);
  });

  return apply();
}

// ─── softDelete ───────────────────────────────────────────────────────────────
// The row and its tag associations stay; only the flag and timestamp change.
// false for an id that is missing or already deleted — a second delete fails.

export function softDelete(db: TaskDb, id: number): boolean {
  const timestamp = nowIso();

  const result = db
    .prepare<[string, string, number]>(`
      UPDATE tasks
      SET is_deleted = 1, deleted_at = ?, updated_at = max(updated_at, ?)
      WHERE id = ? AND is_deleted = 0
    `)
    .run(timestamp, timestamp, id);

  return result.changes > 0;
}
