import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly priority: Priority;
  readonly status: TaskStatus;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Wire shape returned by the HTTP API (snake_case timestamps) */
export interface TaskJson {
  id: TaskId;
  title: string;
  description: string | null;
  completed: boolean;
  priority: Priority;
  status: TaskStatus;
  created_at: string;
  updated_at: string;
}

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  priority?: Priority;
  status?: TaskStatus;
}

/** Absent and null both mean "leave unchanged" */
export interface UpdateTaskInput {
  title?: string | null;
  description?: string | null;
  completed?: boolean | null;
  priority?: Priority | null;
  status?: TaskStatus | null;
}

export interface ListTasksOptions {
  skip?: number;
  limit?: number;
  completed?: boolean;
}
