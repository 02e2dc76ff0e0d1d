/**
 * chalk-based output formatting for the todo CLI.
 */

import chalk from 'chalk';
import { Priority, TaskStatus } from '@todo-api/core';
import type { TaskJson } from '@todo-api/core';

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatPriority(priority: Priority): string {
  switch (priority) {
    case Priority.High: return chalk.red.bold('>>>');
    case Priority.Moderate: return chalk.yellow('>> ');
    case Priority.Low: return chalk.blue('>  ');
  }
}

export function formatStatus(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Completed: return chalk.green(status);
    case TaskStatus.InProgress: return chalk.yellow(status);
    case TaskStatus.NotStarted: return chalk.dim(status);
  }
}

/** One line per task: checkbox, padded id, priority marker, title, status */
export function formatTaskLine(task: TaskJson): string {
  const id = chalk.dim(`#${task.id}`.padEnd(5));
  return `${formatCheckbox(task.completed)} ${id} ${formatPriority(task.priority)} ${chalk.bold(task.title)}  ${formatStatus(task.status)}`;
}

export function formatTaskDetail(task: TaskJson): string {
  const rows: Array<[string, string]> = [
    ['ID', String(task.id)],
    ['Title', task.title],
    ['Description', task.description ?? chalk.dim('(none)')],
    ['Completed', task.completed ? 'yes' : 'no'],
    ['Priority', task.priority],
    ['Status', formatStatus(task.status)],
    ['Created', task.created_at],
    ['Updated', task.updated_at],
  ];
  return rows.map(([label, value]) => `${chalk.bold(label.padEnd(12))}${value}`).join('\n');
}

// --- Basic output ---

export function printTasks(tasks: TaskJson[]): void {
  if (tasks.length === 0) {
    info('No open tasks... use the add command to create one');
    return;
  }
  for (const task of tasks) console.log(formatTaskLine(task));
}

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}
