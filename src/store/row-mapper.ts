import type { Area, ChecklistItem, ChecklistStatus, Tag, Task } from '../types.js';
import { Status, TaskType } from '../types.js';
import { localMidnight } from '../date/codec.js';

export interface TaskRow {
  uuid: string;
  type: 'to-do' | 'project' | 'heading' | null;
  trashed: number | null;
  title: string | null;
  status: 'incomplete' | 'canceled' | 'completed' | null;
  area: string | null;
  area_title: string | null;
  project: string | null;
  project_title: string | null;
  heading: string | null;
  heading_title: string | null;
  notes: string | null;
  tags: number | null;
  start: string | null;
  checklist: number | null;
  start_date: string | number | null;   // 'YYYY-MM-DD', or 0 when unset
  deadline: string | number | null;
  reminder_time: string | number | null; // 'HH:MM'
  stop_date: string | null;             // 'YYYY-MM-DD HH:MM:SS'
  created: string | null;
  modified: string | null;
  index: number | null;
  today_index: number | null;
}

export interface AreaRow {
  uuid: string;
  type: string;
  title: string | null;
  tags: number | null;
}

export interface TagRow {
  uuid: string;
  type: string;
  title: string | null;
  shortcut: string | null;
  parent: string | null;
}

export interface ChecklistItemRow {
  title: string | null;
  status: ChecklistStatus | null;
  stop_date: string | null;
  type: string;
  uuid: string;
  created: string | null;
  modified: string | null;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

/** Parses `YYYY-MM-DD` into local midnight; anything else is `null`. */
export function parseDate(value: string | number | null): Date | null {
  if (typeof value !== 'string') return null;
  const m = DATE_PATTERN.exec(value);
  if (m === null) return null;
  return localMidnight(Number(m[1]), Number(m[2]), Number(m[3]));
}

/** Parses `YYYY-MM-DD HH:MM:SS` (already local time) into a Date. */
export function parseDateTime(value: string | null): Date | null {
  if (value === null) return null;
  const m = DATE_TIME_PATTERN.exec(value);
  if (m === null) return null;
  return new Date(
    Number(m[1]), Number(m[2]) - 1, Number(m[3]),
    Number(m[4]), Number(m[5]), Number(m[6]),
  );
}

/** Validates an `HH:MM` string; the reminder keeps no date component. */
export function parseTime(value: string | number | null): string | null {
  if (typeof value !== 'string') return null;
  return TIME_PATTERN.test(value) ? value : null;
}

function toTaskType(value: TaskRow['type']): TaskType {
  switch (value) {
    case 'project':
      return TaskType.Project;
    case 'heading':
      return TaskType.Heading;
    default:
      return TaskType.Todo;
  }
}

function toStatus(value: TaskRow['status']): Status {
  switch (value) {
    case 'completed':
      return Status.Completed;
    case 'canceled':
      return Status.Canceled;
    default:
      return Status.Incomplete;
  }
}

const EPOCH = new Date(0);

/**
 * Maps a task row. `tags` and `checklist` start as empty arrays when the row
 * is flagged as having them (`hasTags`/`hasChecklist`); the query layer
 * fills them in.
 */
export function mapTaskRow(row: TaskRow): Task {
  return {
    uuid: row.uuid,
    type: toTaskType(row.type),
    title: row.title ?? '',
    status: toStatus(row.status),
    notes: row.notes ?? '',
    start: row.start ?? '',
    trashed: row.trashed === 1,
    areaUUID: row.area,
    areaTitle: row.area_title,
    projectUUID: row.project,
    projectTitle: row.project_title,
    headingUUID: row.heading,
    headingTitle: row.heading_title,
    startDate: parseDate(row.start_date),
    deadline: parseDate(row.deadline),
    reminderTime: parseTime(row.reminder_time),
    stopDate: parseDateTime(row.stop_date),
    created: parseDateTime(row.created) ?? EPOCH,
    modified: parseDateTime(row.modified) ?? EPOCH,
    index: row.index ?? 0,
    todayIndex: row.today_index ?? 0,
    hasTags: row.tags === 1,
    hasChecklist: row.checklist === 1,
    tags: [],
    checklist: [],
    items: [],
  };
}

export function mapAreaRow(row: AreaRow): Area {
  return {
    uuid: row.uuid,
    type: 'area',
    title: row.title ?? '',
    hasTags: row.tags === 1,
    tags: [],
    items: [],
  };
}

export function mapTagRow(row: TagRow): Tag {
  return {
    uuid: row.uuid,
    type: 'tag',
    title: row.title ?? '',
    shortcut: row.shortcut ?? '',
    parentUUID: row.parent,
    items: [],
  };
}

export function mapChecklistItemRow(row: ChecklistItemRow): ChecklistItem {
  return {
    uuid: row.uuid,
    type: 'checklist-item',
    title: row.title ?? '',
    status: row.status ?? 'incomplete',
    stopDate: parseDate(row.stop_date),
    created: parseDateTime(row.created) ?? EPOCH,
    modified: parseDateTime(row.modified) ?? EPOCH,
  };
}
