/**
 * CLI helpers: argument parsing and error handling.
 */

import { Priority, TaskStatus } from '@todo-api/core';
import type { TaskId } from '@todo-api/core';
import { describeError } from './client.js';
import * as out from './output.js';

/**
 * Parse a priority argument (name, 1-3 or p1-p3, 1 being highest) into a Priority value.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.trim().toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'moderate': case 'medium': case '2': case 'p2': return Priority.Moderate;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/**
 * Parse a status argument into a TaskStatus value.
 */
export function parseStatusArg(status: string): TaskStatus | null {
  switch (status.trim().toLowerCase().replace(/[\s_]+/g, '-')) {
    case 'not-started': case 'notstarted': case 'todo': return TaskStatus.NotStarted;
    case 'in-progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'completed': case 'complete': case 'done': return TaskStatus.Completed;
    default: return null;
  }
}

/** Parse a task id argument; ids are positive integers */
export function parseTaskId(raw: string): TaskId | null {
  if (!/^\d+$/.test(raw.trim())) return null;
  const id = Number.parseInt(raw, 10);
  return id > 0 ? id : null;
}

/** Parse a non-negative integer option, or null when malformed */
export function parseCount(raw: string | undefined): number | null | undefined {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw.trim())) return null;
  return Number.parseInt(raw, 10);
}

/**
 * Run a command action, printing any failure and setting a non-zero exit code.
 */
export async function $try(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(describeError(err));
    process.exitCode = 1;
  }
}

/** Print a usage problem and mark the run as failed */
export function usageError(message: string): void {
  out.error(message);
  process.exitCode = 1;
}
