export { directExecutor, deferredExecutor, mapTask } from './task.js';
export type { Task, TaskExecutor } from './task.js';
