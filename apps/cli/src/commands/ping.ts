import { Command } from 'commander';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import type { ClientFactory } from './types.js';

export function createPingCommand(clientFor: ClientFactory): Command {
  return new Command('ping')
    .description('Check that the API is reachable')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      const info = await clientFor(cmd).home();
      out.success(`${info.message} (v${info.version})`);
    }));
}
