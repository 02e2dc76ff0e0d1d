/**
 * Task CRUD operations using Drizzle ORM.
 * Expected failures come back as result values; only storage faults throw.
 */

import { eq, and, desc, type SQL } from 'drizzle-orm';
import type { TodoDb } from '../db.js';
import type {
  Task, TaskId, CreateTaskInput, UpdateTaskInput, ListTasksOptions,
} from '../types/task.js';
import type { DataResult, TaskResult } from '../types/results.js';
import { DEFAULT_PRIORITY } from '../types/priority.js';
import { DEFAULT_STATUS } from '../types/task-status.js';
import { tasks, type NewTaskRow } from '../schema/tasks.js';
import {
  toTask, isBlankTitle, nowIso,
  TITLE_EMPTY_MESSAGE, DEFAULT_LIST_LIMIT,
} from './task-helpers.js';

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TodoDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/**
 * Page through open tasks, newest first (ties broken by id, newest first).
 *
 * `completed` is combined with a fixed `completed = false` predicate, so
 * `completed: true` always yields an empty page.
 */
export function listTasks(db: TodoDb, opts: ListTasksOptions = {}): Task[] {
  const { skip = 0, limit = DEFAULT_LIST_LIMIT, completed } = opts;

  const conditions: SQL[] = [];
  if (completed !== undefined) {
    conditions.push(eq(tasks.completed, completed));
  }
  conditions.push(eq(tasks.completed, false));

  const rows = db.select().from(tasks)
    .where(and(...conditions))
    .orderBy(desc(tasks.createdAt), desc(tasks.id))
    .limit(limit)
    .offset(skip)
    .all();
  return rows.map(toTask);
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

export function createTask(db: TodoDb, input: CreateTaskInput): DataResult<Task> {
  if (isBlankTitle(input.title)) return { type: 'error', message: TITLE_EMPTY_MESSAGE };

  const now = nowIso();
  const row = db.insert(tasks).values({
    title: input.title,
    description: input.description ?? null,
    completed: false,
    priority: input.priority ?? DEFAULT_PRIORITY,
    status: input.status ?? DEFAULT_STATUS,
    createdAt: now,
    updatedAt: now,
  }).returning().get();

  const task = toTask(row);
  return { type: 'success', data: task, message: `Created task: ${task.id}` };
}

/**
 * Partial update. Absent or null fields are left untouched; `updatedAt` is
 * refreshed regardless.
 */
export function updateTask(db: TodoDb, taskId: TaskId, patch: UpdateTaskInput): DataResult<Task> {
  return db.transaction((tx): DataResult<Task> => {
    const existing = tx.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).get();
    if (!existing) return { type: 'not-found', taskId };

    if (patch.title != null && isBlankTitle(patch.title)) {
      return { type: 'error', message: TITLE_EMPTY_MESSAGE };
    }

    const changes: Partial<NewTaskRow> = { updatedAt: nowIso() };
    if (patch.title != null) changes.title = patch.title;
    if (patch.description != null) changes.description = patch.description;
    if (patch.completed != null) changes.completed = patch.completed;
    if (patch.priority != null) changes.priority = patch.priority;
    if (patch.status != null) changes.status = patch.status;

    const row = tx.update(tasks).set(changes).where(eq(tasks.id, taskId)).returning().get();
    const task = toTask(row);
    return { type: 'success', data: task, message: `Updated task: ${task.id}` };
  });
}

/** Hard delete */
export function deleteTask(db: TodoDb, taskId: TaskId): TaskResult {
  const result = db.delete(tasks).where(eq(tasks.id, taskId)).run();
  if (result.changes === 0) return { type: 'not-found', taskId };
  return { type: 'success', message: 'Task deleted successfully' };
}
