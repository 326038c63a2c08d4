// =============================================================================
// task.types.ts
// Strict TypeScript types for the task domain.
//
// Naming convention:
//   TaskRow      — one row of the tasks table, mapped to JS types
//   Task         — TaskRow hydrated with its tag set (what repositories return)
//   TaskResponse — what the API sends to clients
//   Create*Input — validated payload to create a new record
//   Update*Input — validated payload to partially update a record
// =============================================================================

// ─── Limits ───────────────────────────────────────────────────────────────────
// Shared by validation (collaborator layer) and the schema CHECK constraints.

export const TITLE_MAX_LENGTH    = 200;
export const TAG_NAME_MAX_LENGTH = 100;
export const MAX_TAGS_PER_TASK   = 50;    // also bounds the ?tags filter, one SQL variable per name
export const PRIORITY_MIN        = 1;
export const PRIORITY_MAX        = 5;
export const DEFAULT_PAGE_LIMIT  = 20;
export const MAX_PAGE_LIMIT      = 100;

// ─── Tag ──────────────────────────────────────────────────────────────────────
// Tags are global: one row per distinct (lowercase) name, shared by all tasks.

export type Tag = Readonly<{
  id:   number;
  name: string;
}>;

// ─── Task rows ────────────────────────────────────────────────────────────────
// - Timestamps are ISO-8601 UTC strings with milliseconds ("2026-10-18T09:30:00.000Z")
// - due_date is a calendar date string ("2026-12-31")
// - SQLite stores booleans as 0/1; the row mapper turns them into real booleans

export type TaskRow = Readonly<{
  id:          number;
  title:       string;
  description: string | null;
  priority:    number;          // 1 (lowest) – 5 (highest)
  due_date:    string;
  completed:   boolean;
  is_deleted:  boolean;
  deleted_at:  string | null;   // non-null exactly when is_deleted
  created_at:  string;
  updated_at:  string;
}>;

export type Task = TaskRow & {
  readonly tags: readonly Tag[];
};

// ─── API response shape ────────────────────────────────────────────────────────
// deleted_at is internal: a client can only ever see live tasks.

export type TaskResponse = Omit<TaskRow, "deleted_at"> & {
  tags: Tag[];
};

export interface TaskPage {
  total:  number;
  limit:  number;
  offset: number;
  tasks:  TaskResponse[];
}

// ─── Inputs ───────────────────────────────────────────────────────────────────

export interface CreateTaskInput {
  title:        string;
  description?: string | null;
  priority:     number;
  due_date:     string;
  tags:         readonly string[];   // normalized: trimmed, lowercase, unique
}

// Partial update of the tag set. Three states, never conflated with null:
//   absent — leave the current tags alone
//   clear  — remove every tag from the task
//   set    — the task ends with exactly `names`
export type TagPatch =
  | { kind: "absent" }
  | { kind: "clear" }
  | { kind: "set"; names: readonly string[] };

export interface UpdateTaskInput {
  title?:       string;
  description?: string | null;   // null = clear the description
  priority?:    number;
  due_date?:    string;
  completed?:   boolean;
  tags:         TagPatch;
}

// ─── Query / filter params ────────────────────────────────────────────────────

export interface TaskFilters {
  completed?: boolean;
  priority?:  number;
  tags?:      readonly string[];   // match tasks having ANY of these
}

export interface Pagination {
  limit:  number;
  offset: number;
}

export interface TaskListResult {
  items: Task[];
  total: number;   // matches before limit/offset
}
