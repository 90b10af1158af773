export { TaskStore, getDefaultTasksPath } from './task-store.js';
export { sanitizeField, formatRecord, parseRecord, FIELD_SEPARATOR } from './record-codec.js';
