import { cloneTask } from '../entities/Task.js';
import type { Task, TaskFields } from '../entities/Task.js';
import type { TaskRepository } from '../repositories/TaskRepository.js';
import type { DeleteTaskResultDto } from '../dtos/TaskDto.js';
import { BulkLimitExceededError, DependencyNotFoundError, NotFoundError } from '../errors.js';
import { calculateChecksum } from './checksum.js';
import { WriteLock } from './WriteLock.js';
import { systemClock } from '../../shared/Clock.js';
import type { Clock } from '../../shared/Clock.js';
import {
  createTaskSchema,
  parseOrThrow,
  updateTaskSchema
} from '../../../application/schemas/taskSchemas.js';
import type {
  CreateTaskInput,
  CreateTaskParams,
  UpdateTaskInput,
  UpdateTaskParams
} from '../../../application/schemas/taskSchemas.js';
import { dispatchNotification, noopNotifier } from './notifications.js';
import type { AnalyticsNotifier, DerivedDataCache, TaskChangeEvent } from '../ports.js';

export const DEFAULT_BULK_LIMIT = 100;

export interface TaskServiceOptions {
  clock?: Clock;
  notifier?: AnalyticsNotifier;
  statsCache?: DerivedDataCache;
  bulkLimit?: number;
}

/**
 * Task Service
 * Owns every task record. Mutations are serialized through a write lock and
 * never await inside the lock, so reads always see whole tasks.
 */
export class TaskService {
  private writeLock = new WriteLock();
  private clock: Clock;
  private notifier: AnalyticsNotifier;
  private statsCache?: DerivedDataCache;
  private bulkLimit: number;

  constructor(private taskRepository: TaskRepository, options: TaskServiceOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.notifier = options.notifier ?? noopNotifier;
    this.statsCache = options.statsCache;
    this.bulkLimit = options.bulkLimit ?? DEFAULT_BULK_LIMIT;
  }

  /**
   * Snapshot of all tasks. The copies are safe to sort and mutate.
   */
  getAllTasks(): Task[] {
    return this.taskRepository.getAllTasks().map(cloneTask);
  }

  /**
   * Get a task by ID
   */
  getTask(id: number): Task {
    const task = this.taskRepository.getTaskById(id);
    if (!task) {
      throw new NotFoundError(id);
    }
    return cloneTask(task);
  }

  countTasks(): number {
    return this.taskRepository.count();
  }

  /**
   * Create a new task
   */
  async createTask(input: CreateTaskInput): Promise<Task> {
    const params = parseOrThrow(createTaskSchema, input, 'task');

    const task = await this.writeLock.run(() => {
      this.assertDependenciesExist(params.dependencies);
      return this.insertTask(params);
    });

    this.notify({ type: 'created', taskId: task.id });
    return cloneTask(task);
  }

  /**
   * Create several tasks in input order. Later items may depend on the IDs
   * earlier items receive. The batch is checked in full before anything is
   * created, so a bad item leaves the store untouched.
   */
  async bulkCreateTasks(inputs: CreateTaskInput[]): Promise<Task[]> {
    if (inputs.length > this.bulkLimit) {
      throw new BulkLimitExceededError(this.bulkLimit, inputs.length);
    }

    const batch = inputs.map((input, index) =>
      parseOrThrow(createTaskSchema, input, `task at index ${index}`)
    );

    const created = await this.writeLock.run(() => {
      const firstId = this.taskRepository.peekNextId();

      batch.forEach((params, index) => {
        const assignedBefore = (dep: number) => dep >= firstId && dep < firstId + index;
        for (const dep of params.dependencies) {
          if (!this.taskRepository.hasTask(dep) && !assignedBefore(dep)) {
            throw new DependencyNotFoundError(dep, `Task at index ${index}`);
          }
        }
      });

      return batch.map((params) => this.insertTask(params));
    });

    for (const task of created) {
      this.notify({ type: 'created', taskId: task.id });
    }
    return created.map(cloneTask);
  }

  /**
   * Update an existing task. Only supplied fields change.
   */
  async updateTask(id: number, input: UpdateTaskInput): Promise<Task> {
    const updates = parseOrThrow(updateTaskSchema, input, 'task update');

    const task = await this.writeLock.run(() => {
      const current = this.taskRepository.getTaskById(id);
      if (!current) {
        throw new NotFoundError(id);
      }

      // A task may list itself on update, unlike on create
      if (updates.dependencies) {
        for (const dep of updates.dependencies) {
          if (dep !== id && !this.taskRepository.hasTask(dep)) {
            throw new DependencyNotFoundError(dep);
          }
        }
      }

      const now = this.timestamp();
      const updatedTask = this.applyUpdates(current, updates);
      updatedTask.updated_at = now;

      if (updates.status === 'completed' && current.completed_at === null) {
        updatedTask.completed_at = now;
      }

      const stored = this.seal(updatedTask);
      this.taskRepository.updateTask(id, stored);
      return stored;
    });

    this.notify({ type: 'updated', taskId: task.id });
    return cloneTask(task);
  }

  /**
   * Delete a task and drop it from every other task's dependencies
   */
  async deleteTask(id: number): Promise<DeleteTaskResultDto> {
    return this.writeLock.run(() => {
      if (!this.taskRepository.hasTask(id)) {
        throw new NotFoundError(id);
      }

      const now = this.timestamp();
      const dependents = this.taskRepository
        .getAllTasks()
        .filter((task) => task.id !== id && task.dependencies.includes(id));

      for (const dependent of dependents) {
        const pruned = this.seal({
          ...dependent,
          dependencies: dependent.dependencies.filter((dep) => dep !== id),
          updated_at: now
        });
        this.taskRepository.updateTask(dependent.id, pruned);
      }

      this.taskRepository.deleteTask(id);

      // Any statistic can change after a delete
      this.statsCache?.invalidateAll();

      return { affectedCount: dependents.length };
    });
  }

  private insertTask(params: CreateTaskParams): Task {
    const task = this.seal({
      id: this.taskRepository.nextId(),
      title: params.title,
      description: params.description ?? null,
      status: 'pending',
      priority: params.priority,
      category: params.category,
      assignee: params.assignee ?? null,
      estimated_hours: params.estimated_hours ?? null,
      actual_hours: null,
      tags: [...params.tags],
      dependencies: [...params.dependencies],
      created_at: this.timestamp(),
      updated_at: null,
      completed_at: null
    });

    const success = this.taskRepository.addTask(task);
    if (!success) {
      throw new Error(`Failed to create task: ${task.id}`);
    }
    return task;
  }

  private applyUpdates(current: Task, updates: UpdateTaskParams): TaskFields {
    const { checksum: _previous, ...fields } = cloneTask(current);

    if (updates.title !== undefined) fields.title = updates.title;
    if (updates.description !== undefined) fields.description = updates.description;
    if (updates.status !== undefined) fields.status = updates.status;
    if (updates.priority !== undefined) fields.priority = updates.priority;
    if (updates.category !== undefined) fields.category = updates.category;
    if (updates.assignee !== undefined) fields.assignee = updates.assignee;
    if (updates.estimated_hours !== undefined) fields.estimated_hours = updates.estimated_hours;
    if (updates.actual_hours !== undefined) fields.actual_hours = updates.actual_hours;
    if (updates.tags !== undefined) fields.tags = [...updates.tags];
    if (updates.dependencies !== undefined) fields.dependencies = [...updates.dependencies];

    return fields;
  }

  private assertDependenciesExist(dependencies: number[]): void {
    for (const dep of dependencies) {
      if (!this.taskRepository.hasTask(dep)) {
        throw new DependencyNotFoundError(dep);
      }
    }
  }

  private seal(task: TaskFields & { checksum?: string }): Task {
    const { checksum: _stale, ...fields } = task;
    return { ...fields, checksum: calculateChecksum(fields) };
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }

  private notify(event: TaskChangeEvent): void {
    dispatchNotification(this.notifier, event);
  }
}
