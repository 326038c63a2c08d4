// =============================================================================
// test/helpers.ts — shared fixtures for the test suites
// =============================================================================

import { openDatabase, type TaskDb } from "../src/db";
import worker from "../src/index";
import { todayIso } from "../src/utils/validation";
import type { ApiResponse, ErrorResponse } from "../src/utils/response";
import type { CreateTaskInput } from "../src/types/task.types";
import type { Env } from "../src/types/env.types";

export function createTestDb(): TaskDb {
  return openDatabase(":memory:");
}

export function createTestEnv(): Env {
  return { DB: createTestDb(), ENVIRONMENT: "test" };
}

export function futureDate(days = 7): string {
  const d = new Date();
  d.setDate(d.getDate() + days);
  return todayIso(d);
}

export function pastDate(days = 1): string {
  return futureDate(-days);
}

export function taskInput(overrides: Partial<CreateTaskInput> = {}): CreateTaskInput {
  return {
    title:    "Write tests",
    priority: 3,
    due_date: "2099-01-01",
    tags:     [],
    ...overrides,
  };
}

// ─── HTTP helper ──────────────────────────────────────────────────────────────

export interface TestResponse<T> {
  status:  number;
  headers: Headers;
  body:    ApiResponse<T> | null;
}

export async function req<T = unknown>(
  env:     Env,
  method:  string,
  path:    string,
  options: { body?: unknown; rawBody?: string } = {}
): Promise<TestResponse<T>> {
  const request = new Request(`http://localhost${path}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: options.rawBody ?? (options.body !== undefined ? JSON.stringify(options.body) : undefined),
  });

  const response = await worker.fetch(request, env);
  const text = await response.text();

  return {
    status:  response.status,
    headers: response.headers,
    body:    text ? (JSON.parse(text) as ApiResponse<T>) : null,
  };
}

// Unwraps { success: true, data } and fails the test on anything else
export function dataOf<T>(res: TestResponse<T>): T {
  if (!res.body || !res.body.success) {
    throw new Error(`expected a success envelope, got ${res.status}: ${JSON.stringify(res.body)}`);
  }
  return res.body.data;
}

// Unwraps { success: false, error } and fails the test on a success envelope
export function errorOf<T>(res: TestResponse<T>): ErrorResponse["error"] {
  if (!res.body || res.body.success) {
    throw new Error(`expected an error envelope, got ${res.status}: ${JSON.stringify(res.body)}`);
  }
  return res.body.error;
}
