import { Command } from 'commander';
import type { CreateTaskInput } from '@todo-api/core';
import * as out from '../output.js';
import { parsePriorityArg, parseStatusArg, usageError, $try } from '../helpers.js';
import type { ClientFactory } from './types.js';

interface AddOptions {
  description?: string;
  priority?: string;
  status?: string;
}

export function createAddCommand(clientFor: ClientFactory): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title...>', 'Task title')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <level>', 'high, moderate or low (default moderate)')
    .option('-s, --status <status>', 'not-started, in-progress or completed')
    .action((words: string[], opts: AddOptions, cmd: Command) => $try(async () => {
      const input: CreateTaskInput = { title: words.join(' ') };
      if (opts.description !== undefined) input.description = opts.description;

      if (opts.priority !== undefined) {
        const priority = parsePriorityArg(opts.priority);
        if (priority === null) return usageError(`Unknown priority: ${opts.priority}`);
        input.priority = priority;
      }
      if (opts.status !== undefined) {
        const status = parseStatusArg(opts.status);
        if (status === null) return usageError(`Unknown status: ${opts.status}`);
        input.status = status;
      }

      const task = await clientFor(cmd).createTask(input);
      out.success(`Task saved with id ${task.id}`);
    }));
}
