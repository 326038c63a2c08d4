// controllers/tag.controller.ts

import * as tagService from '../services/tag.service';
import { ok } from '../utils/response';
import type { Env } from '../types/env.types';

// GET /tags
export async function handleListTags(env: Env): Promise<Response> {
	const tags = tagService.listTags(env.DB);
	return ok(tags);
}
