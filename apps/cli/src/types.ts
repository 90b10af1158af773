import type { TaskSession } from '@todo-simple/core';

/** Opens the session on first use, after global options are parsed */
export type SessionProvider = () => TaskSession;
