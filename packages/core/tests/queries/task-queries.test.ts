import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestDb, type TodoDb } from '../../src/db.js';
import {
  createTask,
  getTaskById,
  listTasks,
  updateTask,
  deleteTask,
} from '../../src/queries/task-queries.js';
import { toTaskJson } from '../../src/queries/task-helpers.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { Priority } from '../../src/types/priority.js';
import type { Task } from '../../src/types/task.js';

let db: TodoDb;

beforeEach(() => {
  db = createTestDb();
});

/** Create a task and return it, failing the test on any non-success result */
function add(title: string, extra: { description?: string } = {}): Task {
  const result = createTask(db, { title, ...extra });
  if (result.type !== 'success') throw new Error(`createTask failed: ${result.type}`);
  return result.data;
}

describe('createTask', () => {
  it('creates a task with defaults', () => {
    const result = createTask(db, { title: 'Buy groceries', description: 'Milk, eggs, bread' });
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;

    const task = result.data;
    expect(task.id).toBe(1);
    expect(task.title).toBe('Buy groceries');
    expect(task.description).toBe('Milk, eggs, bread');
    expect(task.completed).toBe(false);
    expect(task.priority).toBe(Priority.Moderate);
    expect(task.status).toBe(TaskStatus.NotStarted);
    expect(task.createdAt).toBe(task.updatedAt);
    expect(result.message).toBe('Created task: 1');
  });

  it('stores a missing description as null', () => {
    expect(add('Simple task').description).toBeNull();
  });

  it('honours supplied priority and status', () => {
    const result = createTask(db, {
      title: 'Ship it',
      priority: Priority.High,
      status: TaskStatus.InProgress,
    });
    expect(result.type === 'success' && result.data.priority).toBe('High');
    expect(result.type === 'success' && result.data.status).toBe('In Progress');
  });

  it('keeps the title exactly as supplied', () => {
    expect(add('  padded  ').title).toBe('  padded  ');
  });

  it('rejects a whitespace-only title', () => {
    const result = createTask(db, { title: '   ', description: 'Some description' });
    expect(result).toEqual({ type: 'error', message: 'Title cannot be empty' });
    expect(listTasks(db)).toEqual([]);
  });

  it('assigns increasing ids', () => {
    const a = add('a');
    const b = add('b');
    expect(b.id).toBe(a.id + 1);
  });
});

describe('getTaskById', () => {
  it('returns task if found', () => {
    const task = add('test');
    expect(getTaskById(db, task.id)).toEqual(task);
  });

  it('returns null if not found', () => {
    expect(getTaskById(db, 999)).toBeNull();
  });
});

describe('listTasks', () => {
  it('returns an empty list when there are no tasks', () => {
    expect(listTasks(db)).toEqual([]);
  });

  it('returns most recent first', () => {
    add('First');
    add('Second');
    add('Third');
    expect(listTasks(db).map(t => t.title)).toEqual(['Third', 'Second', 'First']);
  });

  it('limits to 5 by default', () => {
    for (let i = 1; i <= 10; i++) add(`Task ${i}`);
    const page = listTasks(db);
    expect(page).toHaveLength(5);
    expect(page.map(t => t.title)).toEqual(['Task 10', 'Task 9', 'Task 8', 'Task 7', 'Task 6']);
  });

  it('applies skip after ordering', () => {
    for (let i = 1; i <= 10; i++) add(`Task ${i}`);
    const page = listTasks(db, { skip: 8, limit: 5 });
    expect(page.map(t => t.title)).toEqual(['Task 2', 'Task 1']);
  });

  it('orders by creation time before id', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    try {
      vi.setSystemTime(new Date('2024-05-02T00:00:00.000Z'));
      add('newer, lower id');
      vi.setSystemTime(new Date('2024-05-01T00:00:00.000Z'));
      add('older, higher id');
    } finally {
      vi.useRealTimers();
    }
    expect(listTasks(db).map(t => t.title)).toEqual(['newer, lower id', 'older, higher id']);
  });

  it('excludes completed tasks', () => {
    const done = add('done');
    add('open 1');
    add('open 2');
    updateTask(db, done.id, { completed: true });

    const page = listTasks(db);
    expect(page.map(t => t.title)).toEqual(['open 2', 'open 1']);
    expect(page.every(t => !t.completed)).toBe(true);
  });

  it('returns open tasks for completed: false', () => {
    const done = add('done');
    add('open');
    updateTask(db, done.id, { completed: true });
    expect(listTasks(db, { completed: false }).map(t => t.title)).toEqual(['open']);
  });

  it('returns nothing for completed: true', () => {
    const done = add('done');
    add('open');
    updateTask(db, done.id, { completed: true });
    expect(listTasks(db, { completed: true })).toEqual([]);
  });
});

describe('updateTask', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('updates only supplied fields', () => {
    const task = add('Old Title', { description: 'keep me' });
    const result = updateTask(db, task.id, { title: 'New Title' });
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;

    expect(result.data.title).toBe('New Title');
    expect(result.data.description).toBe('keep me');
    expect(result.data.completed).toBe(false);
    expect(result.data.priority).toBe(Priority.Moderate);
    expect(result.data.createdAt).toBe(task.createdAt);
  });

  it('sets completed, priority and status', () => {
    const task = add('Task');
    const result = updateTask(db, task.id, {
      completed: true,
      priority: Priority.Low,
      status: TaskStatus.Completed,
    });
    expect(result.type === 'success' && {
      completed: result.data.completed,
      priority: result.data.priority,
      status: result.data.status,
    }).toEqual({ completed: true, priority: 'Low', status: 'Completed' });
  });

  it('treats null as not supplied', () => {
    const task = add('Task', { description: 'stays' });
    const result = updateTask(db, task.id, { title: null, description: null, completed: null });
    expect(result.type === 'success' && result.data.title).toBe('Task');
    expect(result.type === 'success' && result.data.description).toBe('stays');
  });

  it('refreshes updatedAt even without changes', () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2024-01-01T10:00:00.000Z'));
    const task = add('Task');
    vi.setSystemTime(new Date('2024-01-01T11:30:00.000Z'));

    const result = updateTask(db, task.id, {});
    expect(result.type === 'success' && result.data.createdAt).toBe('2024-01-01T10:00:00.000Z');
    expect(result.type === 'success' && result.data.updatedAt).toBe('2024-01-01T11:30:00.000Z');
  });

  it('allows any status transition', () => {
    const task = add('Task');
    updateTask(db, task.id, { status: TaskStatus.Completed });
    const back = updateTask(db, task.id, { status: TaskStatus.NotStarted });
    expect(back.type === 'success' && back.data.status).toBe('Not Started');
  });

  it('rejects a blank title and leaves the row untouched', () => {
    const task = add('Original');
    const result = updateTask(db, task.id, { title: '  ', completed: true });
    expect(result).toEqual({ type: 'error', message: 'Title cannot be empty' });
    expect(getTaskById(db, task.id)).toEqual(task);
  });

  it('returns not-found for a missing id', () => {
    expect(updateTask(db, 42, { title: 'x' })).toEqual({ type: 'not-found', taskId: 42 });
  });

  it('keeps a completed task readable', () => {
    const task = add('Finish');
    updateTask(db, task.id, { completed: true });
    expect(listTasks(db)).toEqual([]);
    expect(getTaskById(db, task.id)?.completed).toBe(true);
  });
});

describe('deleteTask', () => {
  it('removes the row', () => {
    const task = add('Delete me');
    expect(deleteTask(db, task.id)).toEqual({ type: 'success', message: 'Task deleted successfully' });
    expect(getTaskById(db, task.id)).toBeNull();
  });

  it('returns not-found for a missing id', () => {
    expect(deleteTask(db, 7)).toEqual({ type: 'not-found', taskId: 7 });
  });

  it('returns not-found when deleting twice', () => {
    const task = add('once');
    deleteTask(db, task.id);
    expect(deleteTask(db, task.id)).toEqual({ type: 'not-found', taskId: task.id });
  });
});

describe('toTaskJson', () => {
  it('renames timestamps to snake_case', () => {
    const task = add('Wire', { description: 'shape' });
    expect(toTaskJson(task)).toEqual({
      id: task.id,
      title: 'Wire',
      description: 'shape',
      completed: false,
      priority: 'Moderate',
      status: 'Not Started',
      created_at: task.createdAt,
      updated_at: task.updatedAt,
    });
  });
});
