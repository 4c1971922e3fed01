export interface TaskItem {
  description: string;
  priority: number;
}

export type TaskAction = "added" | "updated" | "deleted";

export interface TaskLogEntry {
  timestamp: string;
  action: TaskAction;
  task: TaskItem;
  metadata?: Record<string, unknown>;
}

export interface DeadlineItem {
  event: string;
  /** YYYY-MM-DD */
  deadline: string;
  added: string;
}

export interface UrgentDeadline extends DeadlineItem {
  daysLeft: number;
}

export interface HabitRecord {
  date: string;
  /** Habit id to habit name. */
  completed: Record<string, string>;
  timestamp: string;
}

export interface HabitDefinition {
  id: string;
  name: string;
}
