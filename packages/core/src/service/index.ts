export { TaskService, compareTasks } from './task-service.js';
