import type { Task } from '../entities/Task.js';

/**
 * Task Repository interface
 * Defines the contract for interacting with task storage
 */
export interface TaskRepository {
  /**
   * Get all tasks, in insertion order
   */
  getAllTasks(): Task[];

  /**
   * Get a task by its ID
   */
  getTaskById(id: number): Task | undefined;

  /**
   * Check whether a task with this ID exists
   */
  hasTask(id: number): boolean;

  /**
   * Reserve the next task ID. IDs are never handed out twice.
   */
  nextId(): number;

  /**
   * The ID the next call to nextId() will return, without reserving it
   */
  peekNextId(): number;

  /**
   * Add a new task
   * @returns success status
   */
  addTask(task: Task): boolean;

  /**
   * Update an existing task
   * @returns success status
   */
  updateTask(id: number, task: Task): boolean;

  /**
   * Delete a task
   * @returns success status
   */
  deleteTask(id: number): boolean;

  /**
   * Number of tasks currently stored
   */
  count(): number;
}
