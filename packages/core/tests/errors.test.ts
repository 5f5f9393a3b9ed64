import { describe, it, expect } from 'vitest';
import {
  ValidationError, NotFoundError, StorageError, MissingRecordError, TaskjarError,
} from '../src/errors.js';

describe('error kinds', () => {
  it('carry a code and name', () => {
    expect(new ValidationError('x')).toMatchObject({ name: 'ValidationError', code: 'validation' });
    expect(new NotFoundError(3)).toMatchObject({ name: 'NotFoundError', code: 'not_found', taskId: 3 });
    expect(new StorageError('x', '/tmp/t.json')).toMatchObject({ name: 'StorageError', code: 'storage', filePath: '/tmp/t.json' });
  });

  it('reports a missing record as a storage error', () => {
    const err = new MissingRecordError(5, '/tmp/t.json');
    expect(err).toBeInstanceOf(StorageError);
    expect(err.message).toBe('Task with id=5 does not exist');
    expect(err.taskId).toBe(5);
  });

  it('keeps the cause', () => {
    const cause = new Error('EACCES');
    expect(new StorageError('Failed to write', null, { cause }).cause).toBe(cause);
  });

  it('share a common base', () => {
    expect(new ValidationError('x')).toBeInstanceOf(TaskjarError);
    expect(new MissingRecordError(1)).toBeInstanceOf(TaskjarError);
  });
});
