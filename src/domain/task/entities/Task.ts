/**
 * Task domain entities
 * These types represent the core domain objects in the task tracking system
 */

export const TASK_STATUSES = ['pending', 'in_progress', 'completed', 'blocked', 'cancelled'] as const;
export const TASK_PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export const TASK_CATEGORIES = [
  'development',
  'testing',
  'documentation',
  'deployment',
  'bugfix',
  'feature'
] as const;

/**
 * Lifecycle state of a Task
 */
export type Status = typeof TASK_STATUSES[number];

/**
 * Priority levels for Tasks
 */
export type Priority = typeof TASK_PRIORITIES[number];

/**
 * Kind of work a Task represents
 */
export type Category = typeof TASK_CATEGORIES[number];

/**
 * Severity rank used when ordering by priority
 */
export const PRIORITY_RANK: Record<Priority, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3
};

/**
 * The main Task entity
 */
export interface Task {
  id: number;
  title: string;
  description: string | null;
  status: Status;
  priority: Priority;
  category: Category;
  assignee: string | null;
  estimated_hours: number | null;
  actual_hours: number | null;
  tags: string[];
  dependencies: number[]; // IDs of Tasks this Task depends on
  created_at: string;
  updated_at: string | null;
  completed_at: string | null;
  checksum: string;
}

/**
 * A Task without its fingerprint, the input to the checksum
 */
export type TaskFields = Omit<Task, 'checksum'>;

/**
 * A map of Task IDs to Tasks
 */
export type TaskStore = Map<number, Task>;

/**
 * Copies a Task so that callers never hold a reference into the store
 */
export function cloneTask(task: Task): Task {
  return {
    ...task,
    tags: [...task.tags],
    dependencies: [...task.dependencies]
  };
}
