import type { Task, TaskId } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import { newTask, transitionStatus } from '../types/task.js';
import { MissingRecordError, NotFoundError, ValidationError } from '../errors.js';
import type { TaskRepository } from '../storage/task-repository.js';

export interface TaskDetails {
  title?: string;
  description?: string;
}

/**
 * Business rules on top of a TaskRepository: titles must be non-empty,
 * completed tasks stay completed, and a missing id is always a NotFoundError.
 */
export class TaskService {
  constructor(private readonly repo: TaskRepository) {}

  createTask(title: string, description = ''): Task {
    const trimmed = requireTitle(title);
    return this.repo.add(newTask(trimmed, description.trim()));
  }

  /** All tasks, optionally only those with `status`, in insertion order */
  listTasks(status?: TaskStatus): Task[] {
    const tasks = this.repo.list();
    return status == null ? tasks : tasks.filter(t => t.status === status);
  }

  getTask(id: TaskId): Task {
    const task = this.repo.getById(id);
    if (!task) throw new NotFoundError(id);
    return task;
  }

  changeStatus(id: TaskId, status: TaskStatus): Task {
    const task = transitionStatus(this.getTask(id), status);
    return this.persist(task);
  }

  updateDetails(id: TaskId, details: TaskDetails): Task {
    const task = this.getTask(id);
    if (details.title != null) task.title = requireTitle(details.title);
    if (details.description != null) task.description = details.description.trim();
    return this.persist(task);
  }

  deleteTask(id: TaskId): void {
    try {
      this.repo.delete(id);
    } catch (err: unknown) {
      throw relabelMissing(err);
    }
  }

  private persist(task: Task): Task {
    try {
      return this.repo.update(task);
    } catch (err: unknown) {
      throw relabelMissing(err);
    }
  }
}

function requireTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Title must not be empty');
  }
  return trimmed;
}

/**
 * The repository reports a vanished record as a StorageError. Callers get a
 * NotFoundError for it instead, the same signal as a failed lookup.
 */
function relabelMissing(err: unknown): unknown {
  if (err instanceof MissingRecordError) {
    return new NotFoundError(err.taskId, undefined, { cause: err });
  }
  return err;
}
