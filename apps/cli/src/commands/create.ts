import { Command } from 'commander';
import * as out from '../output.js';
import { serviceFor, $try, type ServiceFactory } from '../helpers.js';

export function createCreateCommand(factory: ServiceFactory): Command {
  return new Command('create')
    .description('Create a new task')
    .argument('<title>', 'Short title for the task')
    .option('-d, --description <text>', 'Optional description', '')
    .action((title: string, opts: { description: string }, cmd: Command) => $try(() => {
      const task = serviceFor(cmd, factory).createTask(title, opts.description);
      out.success(`Created task with id=${task.id}`);
    }));
}
