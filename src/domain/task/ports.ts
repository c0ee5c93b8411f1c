import type { Task } from './entities/Task.js';

/**
 * Collaborator interfaces the task services depend on.
 * Implementations live in infrastructure or alongside the services.
 */

export interface TaskChangeEvent {
  type: 'created' | 'updated';
  taskId: number;
}

/**
 * Best-effort side channel told about task mutations.
 * Nothing the caller sees depends on a notification being delivered.
 */
export interface AnalyticsNotifier {
  notify(event: TaskChangeEvent): void | Promise<void>;
}

/**
 * Anything that can hand out a consistent copy of every task
 */
export interface TaskSnapshotSource {
  getAllTasks(): Task[];
}

/**
 * Anything holding results derived from the whole task set
 */
export interface DerivedDataCache {
  invalidateAll(): void;
}
