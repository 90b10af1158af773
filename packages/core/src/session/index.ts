export { TaskSession, openTaskSession } from './task-session.js';
export type { TaskStats } from './task-session.js';
