import { Command } from 'commander';
import * as out from '../output.js';
import { serviceFor, parseTaskId, $try, type ServiceFactory } from '../helpers.js';

export function createDeleteCommand(factory: ServiceFactory): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<taskId>', 'The task id')
    .action((taskId: string, _opts: unknown, cmd: Command) => $try(() => {
      const id = parseTaskId(taskId);
      serviceFor(cmd, factory).deleteTask(id);
      out.success(`Deleted task with id=${id}`);
    }));
}
