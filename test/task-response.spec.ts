import { describe, it, expect } from "vitest";
import { toTaskPage, toTaskResponse } from "../src/utils/task-response";
import type { Task } from "../src/types/task.types";

const task: Task = {
  id:          7,
  title:       "Ship it",
  description: null,
  priority:    2,
  due_date:    "2099-01-01",
  completed:   false,
  is_deleted:  false,
  deleted_at:  null,
  created_at:  "2026-10-18T10:00:00.000Z",
  updated_at:  "2026-10-18T10:00:00.000Z",
  tags:        [{ id: 3, name: "work" }, { id: 9, name: "alpha" }, { id: 1, name: "Zed" }],
};

describe("toTaskResponse", () => {
  it("drops deleted_at and keeps every other field", () => {
    const response = toTaskResponse(task);

    expect("deleted_at" in response).toBe(false);
    expect(response).toEqual({
      id:          7,
      title:       "Ship it",
      description: null,
      priority:    2,
      due_date:    "2099-01-01",
      completed:   false,
      is_deleted:  false,
      created_at:  "2026-10-18T10:00:00.000Z",
      updated_at:  "2026-10-18T10:00:00.000Z",
      tags:        [{ id: 1, name: "Zed" }, { id: 9, name: "alpha" }, { id: 3, name: "work" }],
    });
  });

  it("does not reorder the source tag list", () => {
    toTaskResponse(task);
    expect(task.tags.map((tag) => tag.id)).toEqual([3, 9, 1]);
  });
});

describe("toTaskPage", () => {
  it("carries the total and the requested window", () => {
    const page = toTaskPage({ items: [task], total: 12 }, { limit: 1, offset: 5 });

    expect(page.total).toBe(12);
    expect(page.limit).toBe(1);
    expect(page.offset).toBe(5);
    expect(page.tasks.map((t) => t.id)).toEqual([7]);
  });
});
