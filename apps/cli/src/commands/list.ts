import { Command } from 'commander';
import { encodeTask } from '@taskjar/core';
import * as out from '../output.js';
import { serviceFor, requireStatus, $try, type ServiceFactory } from '../helpers.js';

export function createListCommand(factory: ServiceFactory): Command {
  return new Command('list')
    .description('List existing tasks')
    .option('-s, --status <status>', 'Filter by status: todo, in_progress, done')
    .option('--json', 'Output in JSON format')
    .action((opts: { status?: string; json?: boolean }, cmd: Command) => $try(() => {
      const status = opts.status != null ? requireStatus(opts.status) : undefined;
      const tasks = serviceFor(cmd, factory).listTasks(status);

      if (opts.json) {
        out.json(tasks.map(encodeTask));
        return;
      }
      out.printTasks(tasks);
    }));
}
