import type { ThingsDatabase } from '../store/database.js';
import { CHECKLIST_ITEMS_SQL, TAGS_OF_AREA_SQL, TAGS_OF_TASK_SQL } from '../store/schema.js';
import { mapChecklistItemRow, type ChecklistItemRow } from '../store/row-mapper.js';
import type { ChecklistItem, QueryOptions } from '../types.js';

interface TagTitleRow {
  title: string | null;
}

function titles(rows: TagTitleRow[]): string[] {
  return rows.flatMap((row) => (row.title === null ? [] : [row.title]));
}

export async function loadTagsOfTask(
  db: ThingsDatabase,
  taskUUID: string,
  options?: QueryOptions,
): Promise<string[]> {
  return titles(await db.all<TagTitleRow>(TAGS_OF_TASK_SQL, [taskUUID], options));
}

export async function loadTagsOfArea(
  db: ThingsDatabase,
  areaUUID: string,
  options?: QueryOptions,
): Promise<string[]> {
  return titles(await db.all<TagTitleRow>(TAGS_OF_AREA_SQL, [areaUUID], options));
}

export async function loadChecklistItems(
  db: ThingsDatabase,
  todoUUID: string,
  options?: QueryOptions,
): Promise<ChecklistItem[]> {
  const rows = await db.all<ChecklistItemRow>(CHECKLIST_ITEMS_SQL, [todoUUID], options);
  return rows.map(mapChecklistItemRow);
}
