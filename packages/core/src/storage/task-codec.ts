/**
 * Maps tasks to and from the on-disk JSON document.
 *
 * The document is a single array of snake_case records. Missing
 * `description` and `status` fall back to their defaults so files written by
 * older versions still load; every other deviation is a StorageError.
 */

import { z } from 'zod';
import type { Task } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { StorageError } from '../errors.js';

// Zone-less stamps are accepted: older files were written without an offset
const timestamp = z.string().datetime({ offset: true, local: true });

const storedTaskSchema = z.object({
  id: z.number().int().safe().nullish(),
  title: z.string(),
  description: z.string().default(''),
  status: z.enum([TaskStatus.Todo, TaskStatus.InProgress, TaskStatus.Done]).default(TaskStatus.Todo),
  created_at: timestamp,
  updated_at: timestamp,
});

export type StoredTask = z.output<typeof storedTaskSchema>;

/** A record as found in the document, before field validation */
export type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function encodeTask(task: Task): StoredTask {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function decodeTask(raw: RawRecord, index: number, filePath: string | null = null): Task {
  const parsed = storedTaskSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'record';
    throw new StorageError(
      `Invalid task record at index ${index} (${field}): ${issue?.message ?? 'unreadable'}`,
      filePath,
      { cause: parsed.error },
    );
  }

  const row = parsed.data;
  return {
    id: row.id ?? null,
    title: row.title,
    description: row.description,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Read the id of a raw record without validating the rest of it */
export function recordId(raw: RawRecord): number | null {
  return typeof raw['id'] === 'number' ? raw['id'] : null;
}

/**
 * Parse document text into its raw records.
 * Empty or whitespace-only text is an empty collection.
 */
export function decodeDocument(text: string, filePath: string | null = null): RawRecord[] {
  if (text.trim().length === 0) return [];

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    throw new StorageError(`Failed to parse ${filePath ?? 'task document'}: not valid JSON`, filePath, { cause: err });
  }

  if (!Array.isArray(data)) {
    throw new StorageError(`${filePath ?? 'Task document'} does not contain a JSON array`, filePath);
  }

  return data.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new StorageError(`Invalid task record at index ${index}: expected an object`, filePath);
    }
    return item;
  });
}

export function encodeDocument(records: readonly RawRecord[]): string {
  return JSON.stringify(records, null, 2) + '\n';
}
