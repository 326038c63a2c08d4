// =============================================================================
// db/index.ts
//   Opens the better-sqlite3 connection that backs the `DB` binding.
//   Pragmas are per-connection, so they are set every time we open one.
// =============================================================================

import Database from "better-sqlite3";
import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";

export type TaskDb = Database.Database;

const SCHEMA_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

/** Raw text of schema.sql — every statement is idempotent */
export function loadSchema(): string {
	return readFileSync(SCHEMA_PATH, "utf8");
}

/**
 * Open (or create) the database at `path` and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(path: string): TaskDb {
	if (path !== ":memory:") {
		mkdirSync(dirname(path), { recursive: true });
	}

	const db = new Database(path);

	db.pragma("journal_mode = WAL");
	db.pragma("foreign_keys = ON");
	// Lock waits are left to SQLite rather than retried in application code
	db.pragma("busy_timeout = 5000");

	db.exec(loadSchema());

	return db;
}
