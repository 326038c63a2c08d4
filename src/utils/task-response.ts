// =============================================================================
// utils/task-response.ts
// Internal records → API shapes. Field picking and renaming only.
// =============================================================================

import type { Pagination, Tag, Task, TaskListResult, TaskPage, TaskResponse } from "../types/task.types";

function byName(a: Tag, b: Tag): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id:          task.id,
    title:       task.title,
    description: task.description,
    priority:    task.priority,
    due_date:    task.due_date,
    completed:   task.completed,
    is_deleted:  task.is_deleted,
    created_at:  task.created_at,
    updated_at:  task.updated_at,
    tags:        [...task.tags].sort(byName).map((tag) => ({ id: tag.id, name: tag.name })),
  };
}

export function toTaskPage(result: TaskListResult, pagination: Pagination): TaskPage {
  return {
    total:  result.total,
    limit:  pagination.limit,
    offset: pagination.offset,
    tasks:  result.items.map(toTaskResponse),
  };
}
