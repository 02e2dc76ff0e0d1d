import { Command } from 'commander';
import { TaskApiClient, DEFAULT_API_URL } from './client.js';
import type { ClientFactory } from './commands/types.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createGetCommand } from './commands/get.js';
import { createUpdateCommand } from './commands/update.js';
import { createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createPingCommand } from './commands/ping.js';

type EnvMap = Record<string, string | undefined>;

/** Client factory reading `--api-url`, then TODO_API_URL, then the default */
export function defaultClientFactory(env: EnvMap = process.env): ClientFactory {
  return (cmd) => {
    const { apiUrl } = cmd.optsWithGlobals<{ apiUrl?: string }>();
    return new TaskApiClient({ baseUrl: apiUrl ?? env['TODO_API_URL'] ?? DEFAULT_API_URL });
  };
}

export function createProgram(clientFor: ClientFactory = defaultClientFactory()): Command {
  const program = new Command()
    .name('todo')
    .description('Command-line client for the Todo API')
    .version('1.0.0')
    .option('--api-url <url>', `API base URL (env: TODO_API_URL, default ${DEFAULT_API_URL})`);

  program.addCommand(createAddCommand(clientFor));
  program.addCommand(createListCommand(clientFor));
  program.addCommand(createGetCommand(clientFor));
  program.addCommand(createUpdateCommand(clientFor));
  program.addCommand(createCheckCommand(clientFor));
  program.addCommand(createUncheckCommand(clientFor));
  program.addCommand(createDeleteCommand(clientFor));
  program.addCommand(createPingCommand(clientFor));

  return program;
}
