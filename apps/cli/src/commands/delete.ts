import { Command } from 'commander';
import * as out from '../output.js';
import { parseTaskId, usageError, $try } from '../helpers.js';
import type { ClientFactory } from './types.js';

export function createDeleteCommand(clientFor: ClientFactory): Command {
  return new Command('delete')
    .description('Permanently delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((rawIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const client = clientFor(cmd);
      for (const rawId of rawIds) {
        const id = parseTaskId(rawId);
        if (id === null) {
          usageError(`Invalid task id: ${rawId}`);
          continue;
        }
        const message = await client.deleteTask(id);
        out.success(`${message} (${id})`);
      }
    }));
}
