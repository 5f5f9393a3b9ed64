import { Command } from 'commander';
import { buildService, type ServiceFactory } from './helpers.js';
import { createCreateCommand } from './commands/create.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createStatusCommand } from './commands/status.js';
import { createEditCommand } from './commands/edit.js';
import { createDeleteCommand } from './commands/delete.js';

export function createProgram(factory: ServiceFactory = buildService): Command {
  const program = new Command()
    .name('taskjar')
    .description('Track tasks in a local JSON file')
    .version('1.0.0')
    .option('--db <path>', 'Path to the JSON file used for storage (default: ./data/tasks.json, or $TASKJAR_DB)');

  // Register commands
  program.addCommand(createCreateCommand(factory));
  program.addCommand(createListCommand(factory));
  program.addCommand(createShowCommand(factory));
  program.addCommand(createStatusCommand(factory));
  program.addCommand(createEditCommand(factory));
  program.addCommand(createDeleteCommand(factory));

  // Default action (no command): show task list
  program.action((_opts: unknown, cmd: Command) => {
    cmd.commands.find(c => c.name() === 'list')?.parse([], { from: 'user' });
  });

  return program;
}
