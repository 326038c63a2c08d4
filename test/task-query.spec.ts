import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as taskRepo from "../src/repositories/task.repository";
import { buildTaskFilter, findAll } from "../src/repositories/task-query";
import { createTestDb, taskInput } from "./helpers";
import type { TaskDb } from "../src/db";
import type { Pagination, TaskListResult } from "../src/types/task.types";

const FIRST_PAGE: Pagination = { limit: 20, offset: 0 };

let db: TaskDb;

function titles(result: TaskListResult): string[] {
  return result.items.map((task) => task.title);
}

// A, B, C, D created one minute apart, so newest first is D, C, B, A
function seed(): void {
  const minute = (n: number) => new Date(Date.UTC(2026, 9, 18, 10, n));

  vi.setSystemTime(minute(0));
  taskRepo.create(db, taskInput({ title: "A", priority: 5, tags: ["work", "urgent"] }));

  vi.setSystemTime(minute(1));
  taskRepo.create(db, taskInput({ title: "B", priority: 3, tags: ["work"] }));

  vi.setSystemTime(minute(2));
  const c = taskRepo.create(db, taskInput({ title: "C", priority: 5, tags: ["home"] }));
  taskRepo.update(db, c.id, { completed: true, tags: { kind: "absent" } });

  vi.setSystemTime(minute(3));
  taskRepo.create(db, taskInput({ title: "D", priority: 1 }));
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["Date"] });
  db = createTestDb();
  seed();
});

afterEach(() => {
  vi.useRealTimers();
});

// ─── buildTaskFilter ──────────────────────────────────────────────────────────

describe("buildTaskFilter", () => {
  it("always excludes soft-deleted rows, even with no filters", () => {
    expect(buildTaskFilter({})).toEqual({ where: "t.is_deleted = 0", bindings: [] });
  });

  it("binds completed as 0/1 and priority as given", () => {
    const { where, bindings } = buildTaskFilter({ completed: false, priority: 4 });

    expect(where).toBe("t.is_deleted = 0 AND t.completed = ? AND t.priority = ?");
    expect(bindings).toEqual([0, 4]);
  });

  it("adds one placeholder per tag name", () => {
    const { where, bindings } = buildTaskFilter({ tags: ["work", "home"] });

    expect(where).toContain("g.name IN (?, ?)");
    expect(bindings).toEqual(["work", "home"]);
  });

  it("ignores an empty tag list", () => {
    expect(buildTaskFilter({ tags: [] }).where).toBe("t.is_deleted = 0");
  });
});

// ─── findAll ──────────────────────────────────────────────────────────────────

describe("findAll", () => {
  it("returns every live task newest first with the full count", () => {
    const result = findAll(db, {}, FIRST_PAGE);

    expect(titles(result)).toEqual(["D", "C", "B", "A"]);
    expect(result.total).toBe(4);
  });

  it("hydrates each task with its tags", () => {
    const result = findAll(db, {}, FIRST_PAGE);
    const a = result.items.find((task) => task.title === "A");

    expect(a?.tags.map((tag) => tag.name)).toEqual(["urgent", "work"]);
  });

  it("matches tasks carrying any of the requested tags, each once", () => {
    const result = findAll(db, { tags: ["work", "urgent"] }, FIRST_PAGE);

    expect(titles(result)).toEqual(["B", "A"]);
    expect(result.total).toBe(2);
  });

  it("filters by priority", () => {
    expect(titles(findAll(db, { priority: 5 }, FIRST_PAGE))).toEqual(["C", "A"]);
  });

  it("filters by completion state", () => {
    expect(titles(findAll(db, { completed: true }, FIRST_PAGE))).toEqual(["C"]);
    expect(titles(findAll(db, { completed: false }, FIRST_PAGE))).toEqual(["D", "B", "A"]);
  });

  it("combines filters with AND", () => {
    const result = findAll(db, { priority: 5, tags: ["work"] }, FIRST_PAGE);

    expect(titles(result)).toEqual(["A"]);
    expect(result.total).toBe(1);
  });

  it("returns nothing for a tag no task carries", () => {
    const result = findAll(db, { tags: ["missing"] }, FIRST_PAGE);

    expect(result).toEqual({ items: [], total: 0 });
  });

  it("excludes soft-deleted tasks from both the page and the count", () => {
    const [d] = findAll(db, { priority: 1 }, FIRST_PAGE).items;
    taskRepo.softDelete(db, d?.id ?? 0);

    const result = findAll(db, {}, FIRST_PAGE);

    expect(titles(result)).toEqual(["C", "B", "A"]);
    expect(result.total).toBe(3);
  });

  it("pages without overlap and reports the same total on every page", () => {
    const first  = findAll(db, {}, { limit: 2, offset: 0 });
    const second = findAll(db, {}, { limit: 2, offset: 2 });

    expect(titles(first)).toEqual(["D", "C"]);
    expect(titles(second)).toEqual(["B", "A"]);
    expect(first.total).toBe(4);
    expect(second.total).toBe(4);

    const whole = findAll(db, {}, { limit: 4, offset: 0 });
    expect([...titles(first), ...titles(second)]).toEqual(titles(whole));
  });

  it("returns an empty page but the real total past the end", () => {
    const result = findAll(db, {}, { limit: 10, offset: 50 });

    expect(result.items).toEqual([]);
    expect(result.total).toBe(4);
  });

  it("breaks created_at ties by id, highest first", () => {
    const tieDb = createTestDb();
    vi.setSystemTime(new Date("2026-10-18T12:00:00.000Z"));
    taskRepo.create(tieDb, taskInput({ title: "first" }));
    taskRepo.create(tieDb, taskInput({ title: "second" }));
    taskRepo.create(tieDb, taskInput({ title: "third" }));

    const pageOne = findAll(tieDb, {}, { limit: 2, offset: 0 });
    const pageTwo = findAll(tieDb, {}, { limit: 2, offset: 2 });

    expect(titles(pageOne)).toEqual(["third", "second"]);
    expect(titles(pageTwo)).toEqual(["first"]);
  });
});
