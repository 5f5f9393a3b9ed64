import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonFileTaskRepository } from '../../src/storage/json-file-repository.js';
import { newTask } from '../../src/types/task.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { MissingRecordError, StorageError, ValidationError } from '../../src/errors.js';
import { steppingClock } from '../helpers.js';

let tmpDir: string;
let filePath: string;
let repo: JsonFileTaskRepository;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'taskjar-repo-test-'));
  filePath = join(tmpDir, 'data', 'tasks.json');
  repo = new JsonFileTaskRepository(filePath, { now: steppingClock() });
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('list', () => {
  it('returns an empty list when the file is absent', () => {
    expect(repo.list()).toEqual([]);
    expect(existsSync(filePath)).toBe(false);
  });

  it('returns an empty list when the file is blank', () => {
    writeFileSync(join(tmpDir, 'blank.json'), '\n');
    expect(new JsonFileTaskRepository(join(tmpDir, 'blank.json')).list()).toEqual([]);
  });

  it('fails with StorageError on a plain string', () => {
    const path = join(tmpDir, 'bad.json');
    writeFileSync(path, 'not a json array');
    expect(() => new JsonFileTaskRepository(path).list()).toThrow(StorageError);
  });

  it('fails with StorageError on a top-level object', () => {
    const path = join(tmpDir, 'object.json');
    writeFileSync(path, '{"tasks": []}');
    expect(() => new JsonFileTaskRepository(path).list()).toThrow(StorageError);
  });

  it('fails with StorageError when a record misses a required field', () => {
    const path = join(tmpDir, 'partial.json');
    writeFileSync(path, JSON.stringify([{ id: 1, title: 'no timestamps' }]));
    expect(() => new JsonFileTaskRepository(path).list()).toThrow(StorageError);
  });

  it('fails with StorageError when the path is a directory', () => {
    expect(() => new JsonFileTaskRepository(tmpDir).list()).toThrow(`Failed to read from ${tmpDir}`);
  });
});

describe('add', () => {
  it('creates the parent directory and assigns id 1', () => {
    const task = repo.add(newTask('first'));
    expect(task.id).toBe(1);
    expect(existsSync(filePath)).toBe(true);
  });

  it('assigns max id + 1', () => {
    writeFileSync(join(tmpDir, 'gaps.json'), JSON.stringify([
      { id: 7, title: 'seven', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' },
      { id: 3, title: 'three', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' },
    ]));
    const gaps = new JsonFileTaskRepository(join(tmpDir, 'gaps.json'));
    expect(gaps.add(newTask('next')).id).toBe(8);
  });

  it('counts records without an id as 0', () => {
    writeFileSync(join(tmpDir, 'noid.json'), JSON.stringify([
      { title: 'legacy', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' },
    ]));
    const legacy = new JsonFileTaskRepository(join(tmpDir, 'noid.json'));
    expect(legacy.add(newTask('next')).id).toBe(1);
  });

  it('mutates the input task with id and timestamps', () => {
    const input = newTask('stamp me', '', new Date('2020-01-01T00:00:00.000Z'));
    const returned = repo.add(input);
    expect(returned).toBe(input);
    expect(input.createdAt).toBe('2026-03-01T10:00:00.000Z');
    expect(input.updatedAt).toBe('2026-03-01T10:00:00.000Z');
  });

  it('writes the document as a JSON array of snake_case records', () => {
    repo.add(newTask('persisted', 'desc'));
    expect(JSON.parse(readFileSync(filePath, 'utf-8'))).toEqual([
      {
        id: 1,
        title: 'persisted',
        description: 'desc',
        status: 'todo',
        created_at: '2026-03-01T10:00:00.000Z',
        updated_at: '2026-03-01T10:00:00.000Z',
      },
    ]);
  });

  it('leaves no temporary file behind', () => {
    repo.add(newTask('one'));
    expect(readdirSync(join(tmpDir, 'data'))).toEqual(['tasks.json']);
  });

  it('refuses to assign an id beyond the safe integer range', () => {
    writeFileSync(join(tmpDir, 'big.json'), JSON.stringify([
      { id: Number.MAX_SAFE_INTEGER, title: 'last', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' },
    ]));
    const big = new JsonFileTaskRepository(join(tmpDir, 'big.json'));
    expect(() => big.add(newTask('next'))).toThrow(StorageError);
    expect(big.list()).toHaveLength(1);
  });

  it('rejects a stored id outside the safe integer range', () => {
    writeFileSync(join(tmpDir, 'huge.json'),
      '[{"id": 9007199254740992, "title": "x", "created_at": "2026-01-01T00:00:00Z", "updated_at": "2026-01-01T00:00:00Z"}]');
    const huge = new JsonFileTaskRepository(join(tmpDir, 'huge.json'));
    expect(() => huge.add(newTask('next'))).toThrow(StorageError);
  });

  it('refuses to add on top of a malformed file', () => {
    writeFileSync(join(tmpDir, 'bad.json'), '[{"id": 1}]');
    const bad = new JsonFileTaskRepository(join(tmpDir, 'bad.json'));
    expect(() => bad.add(newTask('x'))).toThrow(StorageError);
    expect(readFileSync(join(tmpDir, 'bad.json'), 'utf-8')).toBe('[{"id": 1}]');
  });
});

describe('getById', () => {
  it('returns the matching task', () => {
    repo.add(newTask('a'));
    repo.add(newTask('b'));
    expect(repo.getById(2)?.title).toBe('b');
  });

  it('returns null when absent', () => {
    repo.add(newTask('a'));
    expect(repo.getById(99)).toBeNull();
  });

  it('returns the first match when ids collide', () => {
    writeFileSync(join(tmpDir, 'dupes.json'), JSON.stringify([
      { id: 1, title: 'first', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' },
      { id: 1, title: 'second', created_at: '2026-01-01T00:00:00Z', updated_at: '2026-01-01T00:00:00Z' },
    ]));
    expect(new JsonFileTaskRepository(join(tmpDir, 'dupes.json')).getById(1)?.title).toBe('first');
  });
});

describe('update', () => {
  it('rejects a task without an id', () => {
    expect(() => repo.update(newTask('x'))).toThrow(ValidationError);
  });

  it('fails with StorageError when the id is not stored', () => {
    const ghost = { ...newTask('ghost'), id: 5 };
    expect(() => repo.update(ghost)).toThrow(MissingRecordError);
  });

  it('rewrites the record in place and refreshes updatedAt', () => {
    repo.add(newTask('a'));
    const b = repo.add(newTask('b'));
    repo.add(newTask('c'));

    b.status = TaskStatus.InProgress;
    repo.update(b);

    const tasks = repo.list();
    expect(tasks.map(t => t.title)).toEqual(['a', 'b', 'c']);
    expect(tasks[1]).toEqual({
      id: 2,
      title: 'b',
      description: '',
      status: TaskStatus.InProgress,
      createdAt: '2026-03-01T10:00:01.000Z',
      updatedAt: '2026-03-01T10:00:03.000Z',
    });
  });

  it('moves updatedAt past createdAt when the clock runs behind', () => {
    const frozen = new JsonFileTaskRepository(filePath, { now: () => new Date('2026-03-01T10:00:00.000Z') });
    const task = frozen.add(newTask('a'));
    const behind = new JsonFileTaskRepository(filePath, { now: () => new Date('2025-01-01T00:00:00.000Z') });
    behind.update(task);
    expect(task.updatedAt).toBe('2026-03-01T10:00:00.001Z');
  });

  it('moves updatedAt forward on every write within the same millisecond', () => {
    const frozen = new JsonFileTaskRepository(filePath, { now: () => new Date('2026-03-01T10:00:00.000Z') });
    const task = frozen.add(newTask('a'));
    frozen.update(task);
    expect(task.updatedAt).toBe('2026-03-01T10:00:00.001Z');
    frozen.update(task);
    expect(task.updatedAt).toBe('2026-03-01T10:00:00.002Z');
    expect(frozen.getById(1)?.updatedAt).toBe('2026-03-01T10:00:00.002Z');
  });

  it('refreshes updatedAt with the system clock', () => {
    const live = new JsonFileTaskRepository(filePath);
    const task = live.add(newTask('a'));
    live.update(task);
    expect(Date.parse(task.updatedAt)).toBeGreaterThan(Date.parse(task.createdAt));
  });
});

describe('delete', () => {
  it('removes the record', () => {
    repo.add(newTask('a'));
    repo.add(newTask('b'));
    repo.delete(1);
    expect(repo.list().map(t => t.id)).toEqual([2]);
  });

  it('fails with StorageError when nothing matches', () => {
    repo.add(newTask('a'));
    expect(() => repo.delete(42)).toThrow(StorageError);
    expect(repo.list()).toHaveLength(1);
  });

  it('assigns ids from the highest remaining id', () => {
    repo.add(newTask('a'));
    repo.add(newTask('b'));
    repo.delete(1);
    expect(repo.add(newTask('c')).id).toBe(3);
  });
});
