import { Command } from 'commander';
import type { UpdateTaskInput } from '@todo-api/core';
import * as out from '../output.js';
import {
  parseTaskId, parsePriorityArg, parseStatusArg, usageError, $try,
} from '../helpers.js';
import type { ClientFactory } from './types.js';

interface UpdateOptions {
  title?: string;
  description?: string;
  priority?: string;
  status?: string;
}

export function createUpdateCommand(clientFor: ClientFactory): Command {
  return new Command('update')
    .description('Change fields of a task; omitted fields stay as they are')
    .argument('<taskId>', 'The task ID to update')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('-p, --priority <level>', 'high, moderate or low')
    .option('-s, --status <status>', 'not-started, in-progress or completed')
    .action((rawId: string, opts: UpdateOptions, cmd: Command) => $try(async () => {
      const id = parseTaskId(rawId);
      if (id === null) return usageError(`Invalid task id: ${rawId}`);

      const patch: UpdateTaskInput = {};
      if (opts.title !== undefined) patch.title = opts.title;
      if (opts.description !== undefined) patch.description = opts.description;
      if (opts.priority !== undefined) {
        const priority = parsePriorityArg(opts.priority);
        if (priority === null) return usageError(`Unknown priority: ${opts.priority}`);
        patch.priority = priority;
      }
      if (opts.status !== undefined) {
        const status = parseStatusArg(opts.status);
        if (status === null) return usageError(`Unknown status: ${opts.status}`);
        patch.status = status;
      }

      const task = await clientFor(cmd).updateTask(id, patch);
      out.success(`Updated task ${task.id}`);
    }));
}
