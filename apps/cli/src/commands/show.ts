import { Command } from 'commander';
import { encodeTask } from '@taskjar/core';
import * as out from '../output.js';
import { serviceFor, parseTaskId, $try, type ServiceFactory } from '../helpers.js';

export function createShowCommand(factory: ServiceFactory): Command {
  return new Command('show')
    .description('Show detailed information about a task')
    .argument('<taskId>', 'The task id')
    .option('--json', 'Output in JSON format')
    .action((taskId: string, opts: { json?: boolean }, cmd: Command) => $try(() => {
      const task = serviceFor(cmd, factory).getTask(parseTaskId(taskId));

      if (opts.json) {
        out.json(encodeTask(task));
        return;
      }
      out.printTaskDetails(task);
    }));
}
