// =============================================================================
// utils/validation.ts
// APPROACH:
//   - Pure functions, no side effects
//   - Returns typed Result<T> — either { ok: true, value } or { ok: false, details }
//   - Every invalid field is reported, not just the first one
//   - No throwing — caller decides how to handle the error
// =============================================================================

import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  MAX_TAGS_PER_TASK,
  PRIORITY_MAX,
  PRIORITY_MIN,
  TAG_NAME_MAX_LENGTH,
  TITLE_MAX_LENGTH,
  type CreateTaskInput,
  type Pagination,
  type TagPatch,
  type TaskFilters,
  type UpdateTaskInput,
} from "../types/task.types";
import type { FieldErrors } from "./response";

// ─── Result type ──────────────────────────────────────────────────────────────

export type ValidationResult<T> =
  | { ok: true;  value: T }
  | { ok: false; details: FieldErrors };

function result<T>(value: T, details: FieldErrors): ValidationResult<T> {
  return Object.keys(details).length > 0 ? { ok: false, details } : { ok: true, value };
}

// ─── Primitive helpers ────────────────────────────────────────────────────────

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Today's calendar date in local time, YYYY-MM-DD */
export function todayIso(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

// Must be ISO-8601 date: YYYY-MM-DD, and a day that exists (no 2026-02-30)
export function isValidDate(dateStr: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(dateStr)) return false;
  const d = new Date(`${dateStr}T00:00:00Z`);
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === dateStr;
}

/**
 * Trim, lowercase, drop blanks and duplicates. First occurrence wins the order.
 * Returns null when the input is not an array of strings.
 */
export function normalizeTagNames(raw: readonly unknown[]): string[] | null {
  const names: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string") return null;
    const name = entry.trim().toLowerCase();
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

// ─── Field readers ────────────────────────────────────────────────────────────
// Each reader records its own message in `details` and returns undefined on failure.

function readTitle(value: unknown, details: FieldErrors): string | undefined {
  if (typeof value !== "string") {
    details.title = "title must be a string";
    return undefined;
  }
  const title = value.trim();
  if (title.length === 0) {
    details.title = "title must not be empty";
    return undefined;
  }
  if (title.length > TITLE_MAX_LENGTH) {
    details.title = `title must be ${TITLE_MAX_LENGTH} characters or less`;
    return undefined;
  }
  return title;
}

function readDescription(value: unknown, details: FieldErrors): string | null | undefined {
  if (value === null) return null;
  if (typeof value !== "string") {
    details.description = "description must be a string or null";
    return undefined;
  }
  return value.trim();
}

function readPriority(value: unknown, details: FieldErrors): number | undefined {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    details.priority = "priority must be an integer";
    return undefined;
  }
  if (value < PRIORITY_MIN || value > PRIORITY_MAX) {
    details.priority = `priority must be between ${PRIORITY_MIN} and ${PRIORITY_MAX}`;
    return undefined;
  }
  return value;
}

function readDueDate(value: unknown, today: string, details: FieldErrors): string | undefined {
  if (typeof value !== "string" || !isValidDate(value)) {
    details.due_date = "due_date must be a valid date in YYYY-MM-DD format";
    return undefined;
  }
  // ISO dates compare correctly as strings
  if (value < today) {
    details.due_date = "due_date must not be in the past";
    return undefined;
  }
  return value;
}

function readTags(value: unknown, details: FieldErrors): string[] | undefined {
  const names = Array.isArray(value) ? normalizeTagNames(value) : null;
  if (names === null) {
    details.tags = "tags must be an array of strings";
    return undefined;
  }
  if (names.some((name) => name.length > TAG_NAME_MAX_LENGTH)) {
    details.tags = `each tag must be ${TAG_NAME_MAX_LENGTH} characters or less`;
    return undefined;
  }
  if (names.length > MAX_TAGS_PER_TASK) {
    details.tags = `a task can have at most ${MAX_TAGS_PER_TASK} tags`;
    return undefined;
  }
  return names;
}

// ─── Task validation ──────────────────────────────────────────────────────────

function required<T>(
  body:    Record<string, unknown>,
  key:     string,
  details: FieldErrors,
  read:    (value: unknown) => T | undefined
): T | undefined {
  const value = body[key];
  if (value === undefined || value === null) {
    details[key] = `${key} is required`;
    return undefined;
  }
  return read(value);
}

export function validateCreateTaskInput(
  body:  unknown,
  today: string = todayIso()
): ValidationResult<CreateTaskInput> {
  if (!isRecord(body)) {
    return { ok: false, details: { body: "Request body must be a JSON object" } };
  }

  const details: FieldErrors = {};

  const title       = required(body, "title", details, (v) => readTitle(v, details));
  const priority    = required(body, "priority", details, (v) => readPriority(v, details));
  const dueDate     = required(body, "due_date", details, (v) => readDueDate(v, today, details));
  const description = body.description === undefined
    ? undefined
    : readDescription(body.description, details);

  // null and [] both mean "no tags" on create
  const tags = body.tags === undefined || body.tags === null
    ? []
    : readTags(body.tags, details);

  if (title === undefined || priority === undefined || dueDate === undefined || tags === undefined) {
    return { ok: false, details };
  }

  return result(
    {
      title,
      description: description ?? null,
      priority,
      due_date: dueDate,
      tags,
    },
    details
  );
}

// On update the tags key has three meanings:
//   missing or null → leave tags alone
//   [] (or only blanks) → clear every tag
//   anything else → replace the set
function readTagPatch(body: Record<string, unknown>, details: FieldErrors): TagPatch {
  if (body.tags === undefined || body.tags === null) return { kind: "absent" };

  const names = readTags(body.tags, details);
  if (names === undefined) return { kind: "absent" };

  return names.length === 0 ? { kind: "clear" } : { kind: "set", names };
}

export function validateUpdateTaskInput(
  body:  unknown,
  today: string = todayIso()
): ValidationResult<UpdateTaskInput> {
  if (!isRecord(body)) {
    return { ok: false, details: { body: "Request body must be a JSON object" } };
  }

  const details: FieldErrors = {};
  const value: UpdateTaskInput = { tags: readTagPatch(body, details) };

  if (body.title !== undefined) {
    value.title = readTitle(body.title, details);
  }

  if (body.description !== undefined) {
    value.description = readDescription(body.description, details);
  }

  if (body.priority !== undefined) {
    value.priority = readPriority(body.priority, details);
  }

  if (body.due_date !== undefined) {
    value.due_date = readDueDate(body.due_date, today, details);
  }

  if (body.completed !== undefined) {
    if (typeof body.completed === "boolean") {
      value.completed = body.completed;
    } else {
      details.completed = "completed must be a boolean";
    }
  }

  return result(value, details);
}

// ─── Query param parsing ──────────────────────────────────────────────────────
// Empty parameters (?priority=) are treated the same as missing ones.

function readInteger(
  params:  URLSearchParams,
  key:     string,
  min:     number,
  max:     number,
  details: FieldErrors
): number | undefined {
  const raw = params.get(key);
  if (raw === null || raw === "") return undefined;

  const n = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (isNaN(n) || n < min || n > max) {
    details[key] = max === Number.MAX_SAFE_INTEGER
      ? `${key} must be an integer greater than or equal to ${min}`
      : `${key} must be an integer between ${min} and ${max}`;
    return undefined;
  }
  return n;
}

function readBooleanParam(params: URLSearchParams, key: string, details: FieldErrors): boolean | undefined {
  const raw = params.get(key);
  if (raw === null || raw === "") return undefined;

  switch (raw.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      details[key] = `${key} must be true or false`;
      return undefined;
  }
}

export interface TaskListQuery {
  filters:    TaskFilters;
  pagination: Pagination;
}

export function validateTaskListQuery(params: URLSearchParams): ValidationResult<TaskListQuery> {
  const details: FieldErrors = {};

  const completed = readBooleanParam(params, "completed", details);
  const priority  = readInteger(params, "priority", PRIORITY_MIN, PRIORITY_MAX, details);
  const limit     = readInteger(params, "limit", 1, MAX_PAGE_LIMIT, details);
  const offset    = readInteger(params, "offset", 0, Number.MAX_SAFE_INTEGER, details);

  // Comma-separated, e.g. ?tags=work,Urgent → ["work", "urgent"]
  const tagsParam = params.get("tags");
  const tags = tagsParam ? normalizeTagNames(tagsParam.split(",")) ?? [] : [];
  if (tags.length > MAX_TAGS_PER_TASK) {
    details.tags = `tags filter accepts at most ${MAX_TAGS_PER_TASK} names`;
  }

  const filters: TaskFilters = {};
  if (completed !== undefined) filters.completed = completed;
  if (priority  !== undefined) filters.priority  = priority;
  if (tags.length > 0)         filters.tags      = tags;

  return result(
    {
      filters,
      pagination: {
        limit:  limit  ?? DEFAULT_PAGE_LIMIT,
        offset: offset ?? 0,
      },
    },
    details
  );
}
