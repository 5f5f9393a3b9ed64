import type { TaskId } from './types/task.js';

export type TaskjarErrorCode = 'validation' | 'not_found' | 'storage';

export abstract class TaskjarError extends Error {
  abstract readonly code: TaskjarErrorCode;
}

/** Caller-supplied input is structurally invalid. Never retried. */
export class ValidationError extends TaskjarError {
  readonly code = 'validation';

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends TaskjarError {
  readonly code = 'not_found';

  constructor(
    public readonly taskId: TaskId,
    message = `Task with id=${taskId} was not found`,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

/** Read, write or decode failure of the backing store */
export class StorageError extends TaskjarError {
  readonly code = 'storage';

  constructor(
    message: string,
    public readonly filePath: string | null = null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/** An update or delete target is absent from the store at write time */
export class MissingRecordError extends StorageError {
  constructor(
    public readonly taskId: TaskId,
    filePath: string | null = null,
  ) {
    super(`Task with id=${taskId} does not exist`, filePath);
  }
}
