// =============================================================================
// env.types.ts  —  bindings handed to every request handler
// Built once at startup by server.ts from the loaded config (see config.ts).
// =============================================================================

import type { TaskDb } from "../db";

export interface Env {
	// SQLite — relational database (tasks, tags, task_tags)
	DB: TaskDb;

	// "development" | "production" | "test" — echoed by the health check
	ENVIRONMENT: string;
}
