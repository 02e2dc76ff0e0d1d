import type { TaskId } from './task.js';

export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'error'; readonly message: string };

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'error'; readonly message: string };
