export { tasks, TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH } from './tasks.js';
export type { TaskRow, NewTaskRow } from './tasks.js';
