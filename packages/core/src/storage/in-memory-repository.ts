import type { Task } from '../types/task.js';
import { encodeTask, type RawRecord } from './task-codec.js';
import { RecordTaskRepository, type RepositoryOptions } from './task-repository.js';

/** Same contract as the JSON file store, kept in process. Records are copied on every read and write. */
export class InMemoryTaskRepository extends RecordTaskRepository {
  private records: RawRecord[];

  constructor(options: RepositoryOptions & { seed?: readonly Task[] } = {}) {
    super(options);
    this.records = (options.seed ?? []).map(encodeTask);
  }

  protected get location(): null {
    return null;
  }

  protected readRecords(): RawRecord[] {
    return this.records.map(row => ({ ...row }));
  }

  protected writeRecords(records: RawRecord[]): void {
    this.records = records.map(row => ({ ...row }));
  }
}
