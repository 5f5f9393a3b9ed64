import type { Task, TaskId } from '../types/task.js';
import { MissingRecordError, StorageError, ValidationError } from '../errors.js';
import { decodeTask, encodeTask, recordId, type RawRecord } from './task-codec.js';

/**
 * Durable storage of the task collection.
 *
 * Implementations are synchronous and single-writer: every mutation reads the
 * whole collection, changes it, and writes the whole collection back.
 */
export interface TaskRepository {
  /** All stored tasks in insertion order */
  list(): Task[];
  /** First task with the given id, or null */
  getById(id: TaskId): Task | null;
  /** Assign id and timestamps, then persist. Mutates and returns `task`. */
  add(task: Task): Task;
  /** Replace the stored record with the same id, refreshing `updatedAt` */
  update(task: Task): Task;
  delete(id: TaskId): void;
}

export interface RepositoryOptions {
  /** Clock used for `createdAt` / `updatedAt`. Defaults to the system clock. */
  now?: () => Date;
}

/**
 * CRUD over a flat array of stored records. Subclasses only decide where the
 * array lives.
 */
export abstract class RecordTaskRepository implements TaskRepository {
  private readonly now: () => Date;

  protected constructor(options: RepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /** Location reported in storage errors */
  protected abstract get location(): string | null;
  protected abstract readRecords(): RawRecord[];
  protected abstract writeRecords(records: RawRecord[]): void;

  list(): Task[] {
    return this.readRecords().map((row, i) => decodeTask(row, i, this.location));
  }

  getById(id: TaskId): Task | null {
    const rows = this.readRecords();
    const index = rows.findIndex(row => recordId(row) === id);
    const row = rows[index];
    return row ? decodeTask(row, index, this.location) : null;
  }

  add(task: Task): Task {
    const rows = this.readRecords();
    rows.forEach((row, i) => decodeTask(row, i, this.location));

    const maxId = rows.reduce((max, row) => Math.max(max, recordId(row) ?? 0), 0);
    if (maxId >= Number.MAX_SAFE_INTEGER) {
      throw new StorageError(`Cannot assign an id after ${maxId}: ids are exhausted`, this.location);
    }
    const stamp = this.now().toISOString();

    task.id = maxId + 1;
    task.createdAt = stamp;
    task.updatedAt = stamp;

    rows.push(encodeTask(task));
    this.writeRecords(rows);
    return task;
  }

  update(task: Task): Task {
    const id = task.id;
    if (id == null) {
      throw new ValidationError('Cannot update a task without an id');
    }

    const rows = this.readRecords();
    const index = rows.findIndex(row => recordId(row) === id);
    if (index < 0) {
      throw new MissingRecordError(id, this.location);
    }

    task.updatedAt = this.nextUpdateStamp(task);
    rows[index] = encodeTask(task);
    this.writeRecords(rows);
    return task;
  }

  delete(id: TaskId): void {
    const rows = this.readRecords();
    const kept = rows.filter(row => recordId(row) !== id);
    if (kept.length === rows.length) {
      throw new MissingRecordError(id, this.location);
    }
    this.writeRecords(kept);
  }

  /** Strictly after both stored stamps, even within one millisecond or with a clock running behind */
  private nextUpdateStamp(task: Task): string {
    const floor = Math.max(Date.parse(task.createdAt), Date.parse(task.updatedAt)) + 1;
    return new Date(Math.max(this.now().getTime(), floor)).toISOString();
  }
}
