import { packedDateSQLToISO, packedTimeSQLToISO } from '../date/codec.js';
import { SQL_TRUE } from '../query/compiler.js';

export const TABLE_TASK = 'TMTask';
export const TABLE_AREA = 'TMArea';
export const TABLE_TAG = 'TMTag';
export const TABLE_CHECKLIST_ITEM = 'TMChecklistItem';
export const TABLE_TASK_TAG = 'TMTaskTag';
export const TABLE_AREA_TAG = 'TMAreaTag';
export const TABLE_SETTINGS = 'TMSettings';
export const TABLE_META = 'Meta';

// Unix timestamp columns
export const COL_CREATION_DATE = 'creationDate';
export const COL_MODIFICATION_DATE = 'userModificationDate';
export const COL_STOP_DATE = 'stopDate';
// Packed date columns
export const COL_START_DATE = 'startDate';
export const COL_DEADLINE = 'deadline';
// Packed time-of-day column
export const COL_REMINDER_TIME = 'reminderTime';

export const FILTER_IS_TODO = 'type = 0';
export const FILTER_IS_PROJECT = 'type = 1';
export const FILTER_IS_HEADING = 'type = 2';

export const FILTER_IS_INCOMPLETE = 'status = 0';
export const FILTER_IS_CANCELED = 'status = 2';
export const FILTER_IS_COMPLETED = 'status = 3';

export const FILTER_IS_INBOX = 'start = 0';
export const FILTER_IS_ANYTIME = 'start = 1';
export const FILTER_IS_SOMEDAY = 'start = 2';

export const FILTER_IS_TRASHED = 'trashed = 1';
export const FILTER_IS_NOT_TRASHED = 'trashed = 0';

export const FILTER_IS_NOT_RECURRING = 'rt1_recurrenceRule IS NULL';

export const INDEX_DEFAULT = 'index';
export const INDEX_TODAY = 'todayIndex';

export type TaskOrderIndex = typeof INDEX_DEFAULT | typeof INDEX_TODAY;

/** Settings row holding the URL scheme auth token. */
export const SETTINGS_UUID = 'RhAzEf6qDxCD5PmnZVtBZR';

/** Databases at or below this version use an incompatible schema. */
export const MIN_DATABASE_VERSION = 21;

export const DATABASE_VERSION_SQL = `SELECT value FROM ${TABLE_META} WHERE key = 'databaseVersion'`;

export function buildTasksSQL(wherePredicate: string, order: TaskOrderIndex = INDEX_DEFAULT): string {
  const where = wherePredicate === '' ? SQL_TRUE : wherePredicate;
  return `
SELECT DISTINCT
  TASK.uuid,
  CASE
    WHEN TASK.${FILTER_IS_TODO} THEN 'to-do'
    WHEN TASK.${FILTER_IS_PROJECT} THEN 'project'
    WHEN TASK.${FILTER_IS_HEADING} THEN 'heading'
  END AS type,
  CASE
    WHEN TASK.${FILTER_IS_TRASHED} THEN 1
  END AS trashed,
  TASK.title,
  CASE
    WHEN TASK.${FILTER_IS_INCOMPLETE} THEN 'incomplete'
    WHEN TASK.${FILTER_IS_CANCELED} THEN 'canceled'
    WHEN TASK.${FILTER_IS_COMPLETED} THEN 'completed'
  END AS status,
  AREA.uuid AS area,
  AREA.title AS area_title,
  PROJECT.uuid AS project,
  PROJECT.title AS project_title,
  HEADING.uuid AS heading,
  HEADING.title AS heading_title,
  TASK.notes,
  CASE
    WHEN TAG.uuid IS NOT NULL THEN 1
  END AS tags,
  CASE
    WHEN TASK.${FILTER_IS_INBOX} THEN 'Inbox'
    WHEN TASK.${FILTER_IS_ANYTIME} THEN 'Anytime'
    WHEN TASK.${FILTER_IS_SOMEDAY} THEN 'Someday'
  END AS start,
  CASE
    WHEN CHECKLIST_ITEM.uuid IS NOT NULL THEN 1
  END AS checklist,
  ${packedDateSQLToISO(`TASK.${COL_START_DATE}`)} AS start_date,
  ${packedDateSQLToISO(`TASK.${COL_DEADLINE}`)} AS deadline,
  ${packedTimeSQLToISO(`TASK.${COL_REMINDER_TIME}`)} AS reminder_time,
  datetime(TASK.${COL_STOP_DATE}, 'unixepoch', 'localtime') AS stop_date,
  datetime(TASK.${COL_CREATION_DATE}, 'unixepoch', 'localtime') AS created,
  datetime(TASK.${COL_MODIFICATION_DATE}, 'unixepoch', 'localtime') AS modified,
  TASK."${INDEX_DEFAULT}" AS "index",
  TASK.${INDEX_TODAY} AS today_index
FROM
  ${TABLE_TASK} AS TASK
LEFT OUTER JOIN
  ${TABLE_TASK} PROJECT ON TASK.project = PROJECT.uuid
LEFT OUTER JOIN
  ${TABLE_AREA} AREA ON TASK.area = AREA.uuid
LEFT OUTER JOIN
  ${TABLE_TASK} HEADING ON TASK.heading = HEADING.uuid
LEFT OUTER JOIN
  ${TABLE_TASK} PROJECT_OF_HEADING ON HEADING.project = PROJECT_OF_HEADING.uuid
LEFT OUTER JOIN
  ${TABLE_TASK_TAG} TAGS ON TASK.uuid = TAGS.tasks
LEFT OUTER JOIN
  ${TABLE_TAG} TAG ON TAGS.tags = TAG.uuid
LEFT OUTER JOIN
  ${TABLE_CHECKLIST_ITEM} CHECKLIST_ITEM ON TASK.uuid = CHECKLIST_ITEM.task
WHERE
  ${where}
ORDER BY
  TASK."${order}"
`.trim();
}

export function buildAreasSQL(wherePredicate: string): string {
  const where = wherePredicate === '' ? SQL_TRUE : wherePredicate;
  return `
SELECT DISTINCT
  AREA.uuid,
  'area' AS type,
  AREA.title,
  CASE
    WHEN AREA_TAG.areas IS NOT NULL THEN 1
  END AS tags
FROM
  ${TABLE_AREA} AS AREA
LEFT OUTER JOIN
  ${TABLE_AREA_TAG} AREA_TAG ON AREA_TAG.areas = AREA.uuid
LEFT OUTER JOIN
  ${TABLE_TAG} TAG ON TAG.uuid = AREA_TAG.tags
WHERE
  ${where}
ORDER BY AREA."index"
`.trim();
}

export function buildTagsSQL(wherePredicate: string): string {
  const where = wherePredicate === '' ? SQL_TRUE : wherePredicate;
  return `
SELECT
  uuid, 'tag' AS type, title, shortcut, parent
FROM
  ${TABLE_TAG}
WHERE
  ${where}
ORDER BY "index"
`.trim();
}

export const CHECKLIST_ITEMS_SQL = `
SELECT
  CHECKLIST_ITEM.title,
  CASE
    WHEN CHECKLIST_ITEM.${FILTER_IS_INCOMPLETE} THEN 'incomplete'
    WHEN CHECKLIST_ITEM.${FILTER_IS_CANCELED} THEN 'canceled'
    WHEN CHECKLIST_ITEM.${FILTER_IS_COMPLETED} THEN 'completed'
  END AS status,
  date(CHECKLIST_ITEM.${COL_STOP_DATE}, 'unixepoch', 'localtime') AS stop_date,
  'checklist-item' AS type,
  CHECKLIST_ITEM.uuid,
  datetime(CHECKLIST_ITEM.${COL_CREATION_DATE}, 'unixepoch', 'localtime') AS created,
  datetime(CHECKLIST_ITEM.${COL_MODIFICATION_DATE}, 'unixepoch', 'localtime') AS modified
FROM
  ${TABLE_CHECKLIST_ITEM} AS CHECKLIST_ITEM
WHERE
  CHECKLIST_ITEM.task = ?
ORDER BY CHECKLIST_ITEM."index"
`.trim();

export const TAGS_OF_TASK_SQL = `
SELECT
  TAG.title
FROM
  ${TABLE_TASK_TAG} AS TASK_TAG
LEFT OUTER JOIN
  ${TABLE_TAG} TAG ON TAG.uuid = TASK_TAG.tags
WHERE
  TASK_TAG.tasks = ?
ORDER BY TAG."index"
`.trim();

export const TAGS_OF_AREA_SQL = `
SELECT
  TAG.title
FROM
  ${TABLE_AREA_TAG} AS AREA_TAG
LEFT OUTER JOIN
  ${TABLE_TAG} TAG ON TAG.uuid = AREA_TAG.tags
WHERE
  AREA_TAG.areas = ?
ORDER BY TAG."index"
`.trim();

export const AUTH_TOKEN_SQL = `
SELECT uriSchemeAuthenticationToken AS token
FROM ${TABLE_SETTINGS}
WHERE uuid = ?
`.trim();

/** Wraps a SELECT so it returns only the number of rows. */
export function buildCountSQL(sql: string): string {
  return `SELECT COUNT(uuid) AS count FROM (\n${sql}\n)`;
}
