import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { PRIORITY_VALUES, DEFAULT_PRIORITY } from '../types/priority.js';
import { TASK_STATUS_VALUES, DEFAULT_STATUS } from '../types/task-status.js';

export const TITLE_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 1000;

export const tasks = sqliteTable('task', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title', { length: TITLE_MAX_LENGTH }).notNull(),
  description: text('description', { length: DESCRIPTION_MAX_LENGTH }),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  priority: text('priority', { enum: PRIORITY_VALUES }).notNull().default(DEFAULT_PRIORITY),
  status: text('status', { enum: TASK_STATUS_VALUES }).notNull().default(DEFAULT_STATUS),
  /** Set once on insert */
  createdAt: text('created_at').notNull(),
  /** Refreshed by every update, even one that changes nothing */
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('ix_task_title').on(table.title),
  index('ix_task_completed').on(table.completed),
]);

export type TaskRow = typeof tasks.$inferSelect;
export type NewTaskRow = typeof tasks.$inferInsert;
