// services/tag.service.ts
// Tags are read-only over the API: they are created through tasks, never deleted.

import * as tagRepo from '../repositories/tag.repository';
import type { TaskDb } from '../db';
import type { Tag } from '../types/task.types';

export function listTags(db: TaskDb): Tag[] {
	return tagRepo.findAll(db);
}
