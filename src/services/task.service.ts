// =============================================================================
// services/task.service.ts
//   - Repository null/false → AppError.notFound — the only place that decision is made
//   - Writes go through withConflictRetry: a UNIQUE violation on tags.name
//     (another process created the same tag mid-transaction) is retried once,
//     then surfaced as 409
//   - Domain events logged as structured JSON
// =============================================================================

import * as taskRepo from '../repositories/task.repository';
import * as taskQuery from '../repositories/task-query';
import { AppError } from '../middleware/error-handler';
import { log } from '../utils/log';
import type { TaskDb } from '../db';
import type { CreateTaskInput, Pagination, Task, TaskFilters, TaskListResult, UpdateTaskInput } from '../types/task.types';

const TASK_NOT_FOUND = 'Task not found';

// ─── Conflict handling ────────────────────────────────────────────────────────

export function isUniqueViolation(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

// Each attempt is its own transaction, so a failed first attempt leaves nothing behind
export function withConflictRetry<T>(operation: string, write: () => T): T {
	try {
		return write();
	} catch (err) {
		if (!isUniqueViolation(err)) throw err;
		log('warn', { event: 'tag_conflict_retry', operation });
	}

	try {
		return write();
	} catch (err) {
		if (isUniqueViolation(err)) {
			throw AppError.conflict('Concurrent tag creation conflict, please retry');
		}
		throw err;
	}
}

// ─── listTasks ────────────────────────────────────────────────────────────────

export function listTasks(db: TaskDb, filters: TaskFilters, pagination: Pagination): TaskListResult {
	return taskQuery.findAll(db, filters, pagination);
}

// ─── getTask ──────────────────────────────────────────────────────────────────

export function getTask(db: TaskDb, id: number): Task {
	const task = taskRepo.findById(db, id);

	if (!task) {
		throw AppError.notFound(TASK_NOT_FOUND);
	}

	return task;
}

// ─── createTask ───────────────────────────────────────────────────────────────

export function createTask(db: TaskDb, input: CreateTaskInput): Task {
	const task = withConflictRetry('create', () => taskRepo.create(db, input));

	log('info', { event: 'task_created', taskId: task.id, tags: task.tags.length });

	return task;
}

// ─── updateTask ───────────────────────────────────────────────────────────────

export function updateTask(db: TaskDb, id: number, input: UpdateTaskInput): Task {
	const updated = withConflictRetry('update', () => taskRepo.update(db, id, input));

	if (!updated) {
		throw AppError.notFound(TASK_NOT_FOUND);
	}

	log('info', { event: 'task_updated', taskId: id, tags: input.tags.kind });

	return updated;
}

// ─── deleteTask ───────────────────────────────────────────────────────────────
// Soft delete. Not idempotent: the second call for the same id is a 404.

export function deleteTask(db: TaskDb, id: number): void {
	const deleted = taskRepo.softDelete(db, id);

	if (!deleted) {
		throw AppError.notFound(TASK_NOT_FOUND);
	}

	log('info', { event: 'task_deleted', taskId: id });
}
