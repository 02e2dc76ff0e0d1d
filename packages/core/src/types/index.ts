export { TaskStatus, TASK_STATUS_VALUES, DEFAULT_STATUS } from './task-status.js';
export { Priority, PRIORITY_VALUES, DEFAULT_PRIORITY } from './priority.js';
export type {
  TaskId, Task, TaskJson, CreateTaskInput, UpdateTaskInput, ListTasksOptions,
} from './task.js';
export type { TaskResult, DataResult } from './results.js';
