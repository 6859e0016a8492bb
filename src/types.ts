export const TaskType = {
  Todo: 0,
  Project: 1,
  Heading: 2,
} as const;
export type TaskType = (typeof TaskType)[keyof typeof TaskType];

export const Status = {
  Incomplete: 0,
  Canceled: 2,
  Completed: 3,
} as const;
export type Status = (typeof Status)[keyof typeof Status];

export const StartBucket = {
  Inbox: 0,
  Anytime: 1,
  Someday: 2,
} as const;
export type StartBucket = (typeof StartBucket)[keyof typeof StartBucket];

export type ChecklistStatus = 'incomplete' | 'canceled' | 'completed';

/** A to-do, project or heading. */
export interface Task {
  uuid: string;
  type: TaskType;
  title: string;
  status: Status;
  notes: string;
  /** `Inbox`, `Anytime` or `Someday` */
  start: string;
  trashed: boolean;

  areaUUID: string | null;
  areaTitle: string | null;
  projectUUID: string | null;
  projectTitle: string | null;
  headingUUID: string | null;
  headingTitle: string | null;

  /** Local midnight of the scheduled start day */
  startDate: Date | null;
  deadline: Date | null;
  /** `HH:MM` */
  reminderTime: string | null;
  stopDate: Date | null;
  created: Date;
  modified: Date;

  index: number;
  todayIndex: number;

  hasTags: boolean;
  hasChecklist: boolean;
  tags: string[];
  checklist: ChecklistItem[];
  /** Child tasks of projects and headings, loaded with includeItems */
  items: Task[];
}

export interface Area {
  uuid: string;
  type: 'area';
  title: string;
  hasTags: boolean;
  tags: string[];
  items: Task[];
}

export interface Tag {
  uuid: string;
  type: 'tag';
  title: string;
  shortcut: string;
  parentUUID: string | null;
  items: Array<Area | Task>;
}

export interface ChecklistItem {
  uuid: string;
  type: 'checklist-item';
  title: string;
  status: ChecklistStatus;
  stopDate: Date | null;
  created: Date;
  modified: Date;
}

/** Per-call execution options threaded through every datastore round-trip. */
export interface QueryOptions {
  signal?: AbortSignal;
}

export type SQLParam = string | number | bigint | null;
