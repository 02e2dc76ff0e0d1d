import { Command } from 'commander';
import type { TaskId } from '@todo-api/core';
import type { TaskApiClient } from '../client.js';
import * as out from '../output.js';
import { parseTaskId, usageError, $try } from '../helpers.js';
import type { ClientFactory } from './types.js';

type Toggle = (client: TaskApiClient, id: TaskId) => Promise<unknown>;

function createToggleCommand(
  name: string,
  description: string,
  toggle: Toggle,
  verb: string,
  clientFor: ClientFactory,
): Command {
  return new Command(name)
    .description(description)
    .argument('<taskIds...>', `The id(s) of the task(s) to ${name}`)
    .action((rawIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const client = clientFor(cmd);
      for (const rawId of rawIds) {
        const id = parseTaskId(rawId);
        if (id === null) {
          usageError(`Invalid task id: ${rawId}`);
          continue;
        }
        await toggle(client, id);
        out.success(`${verb} task ${id}`);
      }
    }));
}

export function createCheckCommand(clientFor: ClientFactory): Command {
  return createToggleCommand(
    'check', 'Mark one or more tasks completed',
    (client, id) => client.completeTask(id), 'Checked', clientFor,
  );
}

export function createUncheckCommand(clientFor: ClientFactory): Command {
  return createToggleCommand(
    'uncheck', 'Mark one or more tasks open again',
    (client, id) => client.uncompleteTask(id), 'Unchecked', clientFor,
  );
}
