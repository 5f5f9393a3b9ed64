// Types
export { TaskStatus, TaskStatusName, TASK_STATUSES, isTaskStatus } from './types/task-status.js';
export type { TaskId, Task } from './types/task.js';
export { newTask, canTransition, transitionStatus } from './types/task.js';

// Errors
export {
  TaskjarError, ValidationError, NotFoundError, StorageError, MissingRecordError,
} from './errors.js';
export type { TaskjarErrorCode } from './errors.js';

// Storage
export { encodeTask, decodeTask, decodeDocument, encodeDocument } from './storage/task-codec.js';
export type { StoredTask, RawRecord } from './storage/task-codec.js';
export { RecordTaskRepository } from './storage/task-repository.js';
export type { TaskRepository, RepositoryOptions } from './storage/task-repository.js';
export { JsonFileTaskRepository } from './storage/json-file-repository.js';
export { InMemoryTaskRepository } from './storage/in-memory-repository.js';

// Service
export { TaskService } from './services/task-service.js';
export type { TaskDetails } from './services/task-service.js';

// Config
export { resolveStorePath, getDefaultStorePath, STORE_PATH_ENV } from './config.js';
export type { StorePathOptions } from './config.js';
