import { TASK_NOT_FOUND_MESSAGE } from '@todo-api/core';
import type { DataResult, TaskResult } from '@todo-api/core';

/** An error that maps directly onto an HTTP status and `{ detail }` body */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string = TASK_NOT_FOUND_MESSAGE) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

/** Return the data of a successful result, or throw the matching HTTP error */
export function unwrap<T>(result: DataResult<T>): T {
  switch (result.type) {
    case 'success': return result.data;
    case 'not-found': throw new NotFoundError();
    case 'error': throw new ValidationError(result.message);
  }
}

/** Same as `unwrap` for results that carry only a message */
export function unwrapMessage(result: TaskResult): string {
  switch (result.type) {
    case 'success': return result.message;
    case 'not-found': throw new NotFoundError();
    case 'error': throw new ValidationError(result.message);
  }
}
