// Task helpers
export {
  toTask,
  toTaskJson,
  isBlankTitle,
  nowIso,
  TITLE_EMPTY_MESSAGE,
  TASK_NOT_FOUND_MESSAGE,
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
} from './task-helpers.js';

// Task queries
export {
  getTaskById,
  listTasks,
  createTask,
  updateTask,
  deleteTask,
} from './task-queries.js';
