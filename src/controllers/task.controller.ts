// =============================================================================
// controllers/task.controller.ts
//   - PATCH, not PUT — partial updates only
//   - GET /tasks supports ?completed, ?priority, ?tags, ?limit, ?offset
//   - All validation via utils/validation.ts; failures are thrown as AppError
//     and turned into responses by withErrorHandling
//   - Success responses via utils/response.ts helpers, shaped by task-response.ts
// =============================================================================

import * as taskService from '../services/task.service';
import { validateCreateTaskInput, validateUpdateTaskInput, validateTaskListQuery } from '../utils/validation';
import { toTaskPage, toTaskResponse } from '../utils/task-response';
import { AppError } from '../middleware/error-handler';
import { ok, created, noContent } from '../utils/response';
import type { Env } from '../types/env.types';

async function readJson(request: Request): Promise<unknown> {
	try {
		return await request.json();
	} catch {
		throw AppError.badRequest('Request body must be valid JSON');
	}
}

// ─── GET /tasks ───────────────────────────────────────────────────────────────

export async function handleListTasks(request: Request, env: Env): Promise<Response> {
	const url = new URL(request.url);

	const validation = validateTaskListQuery(url.searchParams);
	if (!validation.ok) {
		throw AppError.validation(validation.details);
	}

	const { filters, pagination } = validation.value;
	const result = taskService.listTasks(env.DB, filters, pagination);

	return ok(toTaskPage(result, pagination));
}

// ─── GET /tasks/:id ───────────────────────────────────────────────────────────

export async function handleGetTask(id: number, env: Env): Promise<Response> {
	// getTask throws AppError.notFound — caught by withErrorHandling
	const task = taskService.getTask(env.DB, id);
	return ok(toTaskResponse(task));
}

// ─── POST /tasks ──────────────────────────────────────────────────────────────

export async function handleCreateTask(request: Request, env: Env): Promise<Response> {
	const body = await readJson(request);
	const validation = validateCreateTaskInput(body);
	if (!validation.ok) {
		throw AppError.validation(validation.details);
	}

	const task = taskService.createTask(env.DB, validation.value);

	return created(toTaskResponse(task));
}

// ─── PATCH /tasks/:id ────────────────────────────────────────────────────────
// An empty object is a valid patch: nothing changes except updated_at.

export async function handleUpdateTask(id: number, request: Request, env: Env): Promise<Response> {
	const body = await readJson(request);
	const validation = validateUpdateTaskInput(body);
	if (!validation.ok) {
		throw AppError.validation(validation.details);
	}

	const task = taskService.updateTask(env.DB, id, validation.value);

	return ok(toTaskResponse(task));
}

// ─── DELETE /tasks/:id ────────────────────────────────────────────────────────

export async function handleDeleteTask(id: number, env: Env): Promise<Response> {
	taskService.deleteTask(env.DB, id);
	return noContent();
}
