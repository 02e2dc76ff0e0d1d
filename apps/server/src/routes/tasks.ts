import type { FastifyInstance } from 'fastify';
import {
  createTask, listTasks, getTaskById, updateTask, deleteTask, toTaskJson,
  CreateTaskSchema, UpdateTaskSchema, ListTasksQuerySchema, TaskIdParamsSchema,
} from '@todo-api/core';
import type { TodoDb, TaskJson } from '@todo-api/core';
import { NotFoundError, unwrap, unwrapMessage } from '../errors.js';

export const TASKS_PREFIX = '/api/tasks';

export function registerTaskRoutes(app: FastifyInstance, db: TodoDb): void {
  app.post(TASKS_PREFIX, async (request): Promise<TaskJson> => {
    const body = CreateTaskSchema.parse(request.body);
    return toTaskJson(unwrap(createTask(db, body)));
  });

  app.get(TASKS_PREFIX, async (request): Promise<TaskJson[]> => {
    const query = ListTasksQuerySchema.parse(request.query);
    return listTasks(db, query).map(toTaskJson);
  });

  app.get(`${TASKS_PREFIX}/:id`, async (request): Promise<TaskJson> => {
    const { id } = TaskIdParamsSchema.parse(request.params);
    const task = getTaskById(db, id);
    if (!task) throw new NotFoundError();
    return toTaskJson(task);
  });

  // Partial update despite the verb: omitted fields are left as they are
  app.put(`${TASKS_PREFIX}/:id`, async (request): Promise<TaskJson> => {
    const { id } = TaskIdParamsSchema.parse(request.params);
    const patch = UpdateTaskSchema.parse(request.body ?? {});
    return toTaskJson(unwrap(updateTask(db, id, patch)));
  });

  app.delete(`${TASKS_PREFIX}/:id`, async (request): Promise<{ message: string }> => {
    const { id } = TaskIdParamsSchema.parse(request.params);
    return { message: unwrapMessage(deleteTask(db, id)) };
  });
}
