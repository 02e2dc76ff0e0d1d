/**
 * Typed client for the task HTTP API.
 * Responses are validated with the same zod schemas the server publishes.
 */

import type { z } from 'zod';
import {
  TaskJsonSchema, MessageSchema, ServiceInfoSchema, ErrorBodySchema,
} from '@todo-api/core';
import type {
  TaskId, TaskJson, CreateTaskInput, UpdateTaskInput, ListTasksOptions, ServiceInfo,
} from '@todo-api/core';

export const DEFAULT_API_URL = 'http://localhost:8000';

const TaskListSchema = TaskJsonSchema.array();

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface TaskApiClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

export class TaskApiClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor({ baseUrl = DEFAULT_API_URL, fetch: fetchFn = fetch }: TaskApiClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchFn = fetchFn;
  }

  home(): Promise<ServiceInfo> {
    return this.request('/', ServiceInfoSchema);
  }

  listTasks(opts: ListTasksOptions = {}): Promise<TaskJson[]> {
    const params = new URLSearchParams();
    if (opts.skip !== undefined) params.set('skip', String(opts.skip));
    if (opts.limit !== undefined) params.set('limit', String(opts.limit));
    if (opts.completed !== undefined) params.set('completed', String(opts.completed));
    const query = params.toString();
    return this.request(query ? `/api/tasks?${query}` : '/api/tasks', TaskListSchema);
  }

  getTask(id: TaskId): Promise<TaskJson> {
    return this.request(`/api/tasks/${id}`, TaskJsonSchema);
  }

  createTask(input: CreateTaskInput): Promise<TaskJson> {
    return this.request('/api/tasks', TaskJsonSchema, { method: 'POST', body: input });
  }

  updateTask(id: TaskId, patch: UpdateTaskInput): Promise<TaskJson> {
    return this.request(`/api/tasks/${id}`, TaskJsonSchema, { method: 'PUT', body: patch });
  }

  completeTask(id: TaskId): Promise<TaskJson> {
    return this.updateTask(id, { completed: true });
  }

  uncompleteTask(id: TaskId): Promise<TaskJson> {
    return this.updateTask(id, { completed: false });
  }

  async deleteTask(id: TaskId): Promise<string> {
    const { message } = await this.request(`/api/tasks/${id}`, MessageSchema, { method: 'DELETE' });
    return message;
  }

  private async request<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    init: { method?: string; body?: unknown } = {},
  ): Promise<z.output<T>> {
    const headers: Record<string, string> = { accept: 'application/json' };
    let body: string | undefined;
    if (init.body !== undefined) {
      headers['content-type'] = 'application/json';
      body = JSON.stringify(init.body);
    }

    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method: init.method ?? 'GET',
      headers,
      body,
    });

    if (!response.ok) {
      const parsed = ErrorBodySchema.safeParse(await readJson(response));
      throw new ApiError(response.status, parsed.success ? parsed.data.detail : `HTTP Error: ${response.status}`);
    }

    return schema.parse(await response.json());
  }
}

/** Error bodies may come from a proxy rather than the API; those read as undefined */
async function readJson(response: Response): Promise<unknown> {
  try {
    const payload: unknown = await response.json();
    return payload;
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

/** Human-readable message for anything a client call can throw */
export function describeError(err: unknown): string {
  if (err instanceof ApiError) return err.message;
  // fetch reports connection failures as a TypeError wrapping the socket error
  if (err instanceof TypeError && err.cause !== undefined) return 'Network error. Is the server running?';
  if (err instanceof Error) return err.message;
  return 'An unknown error occurred';
}
