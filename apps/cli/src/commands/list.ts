import { Command } from 'commander';
import * as out from '../output.js';
import { parseCount, usageError, $try } from '../helpers.js';
import type { ClientFactory } from './types.js';

export function createListCommand(clientFor: ClientFactory): Command {
  return new Command('list')
    .description('List open tasks, newest first')
    .option('-n, --limit <count>', 'Number of tasks to show (1-100, default 5)')
    .option('--skip <count>', 'Number of tasks to skip')
    .action((opts: { limit?: string; skip?: string }, cmd: Command) => $try(async () => {
      const limit = parseCount(opts.limit);
      const skip = parseCount(opts.skip);
      if (limit === null) return usageError(`Invalid limit: ${opts.limit}`);
      if (skip === null) return usageError(`Invalid skip: ${opts.skip}`);

      const tasks = await clientFor(cmd).listTasks({ limit, skip });
      out.printTasks(tasks);
    }));
}
