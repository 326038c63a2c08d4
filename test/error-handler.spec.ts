import { describe, it, expect, afterEach, vi } from 'vitest';
import { AppError, withErrorHandling } from '../src/middleware/error-handler';
import type { ErrorResponse } from '../src/utils/response';

afterEach(() => {
	vi.restoreAllMocks();
});

async function failWith(error: unknown): Promise<{ status: number; body: ErrorResponse }> {
	const response = await withErrorHandling(async () => {
		throw error;
	});
	const body = (await response.json()) as ErrorResponse;
	return { status: response.status, body };
}

describe('withErrorHandling', () => {
	it('passes a successful response through untouched', async () => {
		const response = await withErrorHandling(async () => new Response('fine', { status: 200 }));

		expect(response.status).toBe(200);
		expect(await response.text()).toBe('fine');
	});

	it('422 carries the per-field details of AppError.validation', async () => {
		const { status, body } = await failWith(AppError.validation({ title: 'title is required' }));

		expect(status).toBe(422);
		expect(body).toEqual({
			success: false,
			error: { code: 'VALIDATION_FAILED', message: 'Validation Failed', details: { title: 'title is required' } },
		});
	});

	it('400 for AppError.badRequest', async () => {
		const { status, body } = await failWith(AppError.badRequest('Request body must be valid JSON'));

		expect(status).toBe(400);
		expect(body.error).toEqual({ code: 'BAD_REQUEST', message: 'Request body must be valid JSON' });
	});

	it('404 and 409 keep their messages', async () => {
		expect((await failWith(AppError.notFound('Task not found'))).body.error).toEqual({
			code: 'NOT_FOUND',
			message: 'Task not found',
		});
		expect((await failWith(AppError.conflict('try again'))).status).toBe(409);
	});

	it('hides unexpected errors behind a 500', async () => {
		vi.spyOn(console, 'error').mockImplementation(() => {});

		const { status, body } = await failWith(new Error('too many SQL variables'));

		expect(status).toBe(500);
		expect(body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
	});
});
