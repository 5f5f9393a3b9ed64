import { Command } from 'commander';
import { ValidationError } from '@taskjar/core';
import * as out from '../output.js';
import { serviceFor, parseTaskId, $try, type ServiceFactory } from '../helpers.js';

export function createEditCommand(factory: ServiceFactory): Command {
  return new Command('edit')
    .description('Change the title or description of a task')
    .argument('<taskId>', 'The task id')
    .option('-t, --title <text>', 'New title')
    .option('-d, --description <text>', 'New description (pass "" to clear)')
    .action((taskId: string, opts: { title?: string; description?: string }, cmd: Command) => $try(() => {
      const id = parseTaskId(taskId);
      if (opts.title == null && opts.description == null) {
        throw new ValidationError('Nothing to change: pass --title or --description');
      }

      const task = serviceFor(cmd, factory).updateDetails(id, {
        title: opts.title,
        description: opts.description,
      });
      out.success(`Updated task id=${task.id}.`);
    }));
}
