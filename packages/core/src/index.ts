// Types
export type { TaskId, Task } from './types/task.js';
export type { LoadResult, SaveResult, MutationResult, LoadReport } from './types/results.js';
export { isSuccess, toLoadReport } from './types/results.js';

// Persistence
export { TaskStore, getDefaultTasksPath } from './store/index.js';
export { sanitizeField, formatRecord, parseRecord, FIELD_SEPARATOR } from './store/index.js';

// In-memory engine
export { TaskService, compareTasks } from './service/index.js';

// Collaborator API
export { TaskSession, openTaskSession } from './session/index.js';
export type { TaskStats } from './session/index.js';
