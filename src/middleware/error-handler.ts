// =============================================================================
// middleware/error-handler.ts
//   - AppError class: typed errors with HTTP status + code, thrown anywhere
//     in the app and handled here consistently
//   - Structured JSON log for every error
//   - Stack traces logged, hidden from client always
// =============================================================================

import { internalError, badRequest, conflict, notFound, validationFailed, type FieldErrors } from '../utils/response';
import { log } from '../utils/log';

// ─── AppError ──────────────────────────────────────────────────────────────────
// The handler below knows how to convert it to the right HTTP response.

export class AppError extends Error {
	constructor(
		public readonly statusCode: number,
		public readonly code: string,
		message: string,
		public readonly details?: FieldErrors,
	) {
		super(message);
		this.name = 'AppError';
	}

	// ── Convenience factories ────────────────────────────────────────────────────
	static badRequest(message: string): AppError {
		return new AppError(400, 'BAD_REQUEST', message);
	}
	static notFound(message = 'Not found'): AppError {
		return new AppError(404, 'NOT_FOUND', message);
	}
	static conflict(message: string): AppError {
		return new AppError(409, 'CONFLICT', message);
	}
	static validation(details: FieldErrors): AppError {
		return new AppError(422, 'VALIDATION_FAILED', 'Validation Failed', details);
	}
}

// ─── Global error boundary ────────────────────────────────────────────────────

export async function withErrorHandling(handler: () => Promise<Response>): Promise<Response> {
	try {
		return await handler();
	} catch (error: unknown) {
		// ── Known app errors ──────────────────────────────────────────────────────
		if (error instanceof AppError) {
			// warn, not error — these are expected outcomes (400, 404, 409, 422)
			log(error.statusCode >= 500 ? 'error' : 'warn', {
				code: error.code,
				status: error.statusCode,
				message: error.message,
			});

			switch (error.statusCode) {
				case 400:
					return badRequest(error.message, error.code);
				case 404:
					return notFound(error.message);
				case 409:
					return conflict(error.message);
				case 422:
					return validationFailed(error.details ?? {}, error.message);
				default:
					return internalError(error.message);
			}
		}

		// ── Unexpected errors ──────────────────────────────────────────────────────
		const message = error instanceof Error ? error.message : 'Unknown error';
		const stack = error instanceof Error ? error.stack : undefined;

		log('error', { message, stack });

		return internalError();
	}
}
