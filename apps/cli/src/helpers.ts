/**
 * CLI helpers: service wiring, argument parsing, error handling.
 */

import type { Command } from 'commander';
import type { TaskId } from '@taskjar/core';
import {
  TaskService, JsonFileTaskRepository, TaskStatus, TASK_STATUSES, ValidationError, NotFoundError, StorageError,
  isTaskStatus, resolveStorePath,
} from '@taskjar/core';
import * as out from './output.js';

export const ExitCode = {
  Ok: 0,
  Error: 1,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Builds the service for a resolved store path */
export type ServiceFactory = (storePath: string) => TaskService;

/** Default factory: a TaskService over the JSON file at `storePath` */
export function buildService(storePath: string): TaskService {
  return new TaskService(new JsonFileTaskRepository(storePath));
}

/** Resolve the store from the global `--db` option and build the service for it */
export function serviceFor(cmd: Command, factory: ServiceFactory): TaskService {
  const g = cmd.optsWithGlobals<{ db?: string }>();
  return factory(resolveStorePath({ explicitPath: g.db }));
}

/**
 * Parse a status string into a TaskStatus value.
 * Accepts the stored names (dashes for underscores allowed) and a few aliases.
 */
export function parseStatus(status: string): TaskStatus | null {
  const normalized = status.toLowerCase().replace(/-/g, '_');
  if (isTaskStatus(normalized)) return normalized;

  switch (normalized) {
    case 'pending': return TaskStatus.Todo;
    case 'inprogress': case 'wip': case 'doing': return TaskStatus.InProgress;
    case 'complete': case 'completed': return TaskStatus.Done;
    default: return null;
  }
}

/** Like parseStatus, but an unknown value is a ValidationError */
export function requireStatus(status: string): TaskStatus {
  const parsed = parseStatus(status);
  if (parsed == null) {
    throw new ValidationError(`Unknown status: '${status}'. Use: ${TASK_STATUSES.join(', ')}`);
  }
  return parsed;
}

export function parseTaskId(raw: string): TaskId {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) === 0) {
    throw new ValidationError(`Invalid task id: '${raw}'`);
  }
  return Number(trimmed);
}

/** Human-readable line for a failed command */
export function describeError(err: unknown): string {
  if (err instanceof ValidationError) return `Validation error: ${err.message}`;
  if (err instanceof NotFoundError) return `Error: ${err.message}`;
  if (err instanceof StorageError) return `Storage error: ${err.message}`;
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a command action, reporting any error and marking the process as failed.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(describeError(err));
    process.exitCode = ExitCode.Error;
  }
}
