import { Command } from 'commander';
import * as out from '../output.js';
import { serviceFor, parseTaskId, requireStatus, $try, type ServiceFactory } from '../helpers.js';

export function createStatusCommand(factory: ServiceFactory): Command {
  return new Command('status')
    .description('Change the status of a task')
    .argument('<taskId>', 'The task id')
    .argument('<status>', 'The new status: todo, in_progress, done')
    .action((taskId: string, statusStr: string, _opts: unknown, cmd: Command) => $try(() => {
      const id = parseTaskId(taskId);
      const status = requireStatus(statusStr);
      const task = serviceFor(cmd, factory).changeStatus(id, status);
      out.success(`Updated task id=${task.id} to status ${task.status}.`);
    }));
}
