/**
 * chalk-based terminal output. This is the only place the CLI writes to the console.
 */

import chalk from 'chalk';
import { TaskStatus, TaskStatusName } from '@taskjar/core';
import type { Task } from '@taskjar/core';

const DESCRIPTION_INDENT = '    ';

// --- Formatting functions ---

export function formatCheckbox(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Done: return chalk.green('[x]');
    case TaskStatus.InProgress: return chalk.yellow('[-]');
    default: return chalk.gray('[ ]');
  }
}

/** `2026-03-01T10:00:00.000Z` -> `2026-03-01 10:00` */
export function formatTimestamp(iso: string): string {
  return iso.replace('T', ' ').slice(0, 16);
}

/** One task per line, description lines indented and dimmed below it */
export function formatTaskLine(task: Task): string {
  const taskId = chalk.dim(`(${task.id ?? '-'})`);
  const meta = chalk.dim(
    `  ${TaskStatusName[task.status]} · created ${formatTimestamp(task.createdAt)} · updated ${formatTimestamp(task.updatedAt)}`,
  );
  const descLines = task.description
    .split('\n')
    .filter(l => l.trim().length > 0)
    .map(l => `\n${DESCRIPTION_INDENT}${chalk.dim(l)}`)
    .join('');

  return `${taskId} ${formatCheckbox(task.status)} ${chalk.bold(task.title)}${meta}${descLines}`;
}

export function printTasks(tasks: readonly Task[]): void {
  if (tasks.length === 0) {
    warning('No tasks found.');
    return;
  }
  for (const task of tasks) {
    console.log(formatTaskLine(task));
  }
}

export function printTaskDetails(task: Task): void {
  field('ID', String(task.id ?? '-'));
  field('Title', task.title);
  field('Status', `${formatCheckbox(task.status)} ${TaskStatusName[task.status]}`);
  field('Created', formatTimestamp(task.createdAt));
  field('Updated', formatTimestamp(task.updatedAt));
  console.log(chalk.bold('Description:'));
  console.log(task.description.length > 0 ? task.description : chalk.dim('(none)'));
}

function field(label: string, value: string): void {
  console.log(`${chalk.bold(`${label}:`)}${' '.repeat(12 - label.length)}${value}`);
}

export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
