import { TaskStatus } from './task-status.js';
import { ValidationError } from '../errors.js';

export type TaskId = number;

/**
 * A single trackable work item.
 *
 * `id` stays null until the repository first persists the task; from then on
 * it never changes. The repository owns both timestamps.
 */
export interface Task {
  id: TaskId | null;
  title: string;
  description: string;
  status: TaskStatus;
  createdAt: string; // ISO string
  updatedAt: string; // ISO string
}

/** Create an unpersisted task in the `todo` state */
export function newTask(title: string, description = '', now?: Date): Task {
  const stamp = (now ?? new Date()).toISOString();
  return {
    id: null,
    title,
    description,
    status: TaskStatus.Todo,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

/** `done` is terminal; every other move, and staying put, is allowed */
export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  if (from === to) return true;
  return from !== TaskStatus.Done;
}

/** Move a task to a new status in place. Throws without mutating on an illegal move. */
export function transitionStatus(task: Task, to: TaskStatus): Task {
  if (!canTransition(task.status, to)) {
    throw new ValidationError(
      `Cannot move task ${task.id ?? '(new)'} from '${task.status}' to '${to}': completed tasks stay completed`,
    );
  }
  task.status = to;
  return task;
}
