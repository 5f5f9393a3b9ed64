import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StorageError } from '../errors.js';
import { decodeDocument, encodeDocument, type RawRecord } from './task-codec.js';
import { RecordTaskRepository, type RepositoryOptions } from './task-repository.js';

/**
 * Task repository backed by a single JSON file.
 *
 * Not safe for concurrent writers: two processes mutating the same file race,
 * and the last full-file write wins.
 */
export class JsonFileTaskRepository extends RecordTaskRepository {
  readonly filePath: string;

  constructor(filePath: string, options: RepositoryOptions = {}) {
    super(options);
    this.filePath = filePath;
  }

  protected get location(): string {
    return this.filePath;
  }

  protected readRecords(): RawRecord[] {
    if (!existsSync(this.filePath)) return [];

    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf-8');
    } catch (err: unknown) {
      throw new StorageError(`Failed to read from ${this.filePath}`, this.filePath, { cause: err });
    }
    return decodeDocument(text, this.filePath);
  }

  /** Write to a sibling temp file, then rename it over the target */
  protected writeRecords(records: RawRecord[]): void {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(tmpPath, encodeDocument(records), 'utf-8');
      renameSync(tmpPath, this.filePath);
    } catch (err: unknown) {
      throw new StorageError(`Failed to write to ${this.filePath}`, this.filePath, { cause: err });
    }
  }
}
