import { Command } from 'commander';
import * as out from '../output.js';
import { parseTaskId, usageError, $try } from '../helpers.js';
import type { ClientFactory } from './types.js';

export function createGetCommand(clientFor: ClientFactory): Command {
  return new Command('get')
    .description('Get detailed information about a task')
    .argument('<taskId>', 'The task ID to retrieve')
    .option('--json', 'Output in JSON format')
    .action((rawId: string, opts: { json?: boolean }, cmd: Command) => $try(async () => {
      const id = parseTaskId(rawId);
      if (id === null) return usageError(`Invalid task id: ${rawId}`);

      const task = await clientFor(cmd).getTask(id);
      if (opts.json) {
        console.log(JSON.stringify(task, null, 2));
      } else {
        out.info(out.formatTaskDetail(task));
      }
    }));
}
