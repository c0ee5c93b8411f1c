import type { Task, TaskStore } from '../../domain/task/entities/Task.js';
import type { TaskRepository } from '../../domain/task/repositories/TaskRepository.js';

/**
 * In-memory implementation of the TaskRepository
 * Holds tasks for the lifetime of the process; nothing is written to disk
 */
export class InMemoryTaskRepository implements TaskRepository {
  private taskStore: TaskStore = new Map();
  private lastId = 0;

  /**
   * Get all tasks
   */
  getAllTasks(): Task[] {
    return Array.from(this.taskStore.values());
  }

  /**
   * Get a task by its ID
   */
  getTaskById(id: number): Task | undefined {
    return this.taskStore.get(id);
  }

  hasTask(id: number): boolean {
    return this.taskStore.has(id);
  }

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  peekNextId(): number {
    return this.lastId + 1;
  }

  /**
   * Add a new task
   */
  addTask(task: Task): boolean {
    if (!task.id || this.taskStore.has(task.id)) {
      return false;
    }

    this.taskStore.set(task.id, task);
    return true;
  }

  /**
   * Update an existing task
   */
  updateTask(id: number, task: Task): boolean {
    if (!this.taskStore.has(id)) {
      return false;
    }

    this.taskStore.set(id, task);
    return true;
  }

  /**
   * Delete a task
   */
  deleteTask(id: number): boolean {
    return this.taskStore.delete(id);
  }

  count(): number {
    return this.taskStore.size;
  }
}
