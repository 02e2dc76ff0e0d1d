/**
 * Pure task helpers: row mapping, wire serialization and title checks.
 */

import type { TaskRow } from '../schema/tasks.js';
import type { Task, TaskJson } from '../types/task.js';

export const TITLE_EMPTY_MESSAGE = 'Title cannot be empty';
export const TASK_NOT_FOUND_MESSAGE = 'Task not found';

export const DEFAULT_LIST_LIMIT = 5;
export const MAX_LIST_LIMIT = 100;

/** Map a Drizzle row to a Task object */
export function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    completed: row.completed,
    priority: row.priority,
    status: row.status,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function toTaskJson(task: Task): TaskJson {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    priority: task.priority,
    status: task.status,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function isBlankTitle(title: string): boolean {
  return title.trim().length === 0;
}

export function nowIso(): string {
  return new Date().toISOString();
}
