// Types
export {
  TaskStatus, TASK_STATUS_VALUES, DEFAULT_STATUS,
  Priority, PRIORITY_VALUES, DEFAULT_PRIORITY,
} from './types/index.js';
export type {
  TaskId, Task, TaskJson, CreateTaskInput, UpdateTaskInput, ListTasksOptions,
  TaskResult, DataResult,
} from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, closeDb, CREATE_SCHEMA_SQL } from './db.js';
export type { TodoDb } from './db.js';

// Queries
export * from './queries/index.js';

// Validation
export * from './validation/task-schemas.js';
