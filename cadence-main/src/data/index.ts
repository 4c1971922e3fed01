export type * from "./types.js";
export { TaskLog } from "./task-log.js";
export { TaskStore, sortByPriority, URGENT_PRIORITY_THRESHOLD } from "./task-store.js";
export type { AddTaskResult, RemoveTasksResult, TaskStoreOptions } from "./task-store.js";
export { DeadlineStore, resolveDeadlineDate, DEFAULT_URGENT_WINDOW_DAYS } from "./deadline-store.js";
export { HabitStore, parseHabitDefinitions } from "./habit-store.js";
export type { HabitStoreOptions } from "./habit-store.js";
