/**
 * Task domain errors
 * Every error here is a caller-input error: surfaced directly, never retried
 */

export interface FieldIssue {
  path: string;
  message: string;
}

export abstract class TaskTrackerError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends TaskTrackerError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, readonly issues: FieldIssue[] = []) {
    super(message);
  }
}

export class DependencyNotFoundError extends TaskTrackerError {
  readonly code = 'DEPENDENCY_NOT_FOUND';

  constructor(readonly dependencyId: number, context?: string) {
    super(`${context ? `${context}: ` : ''}Dependency task ${dependencyId} not found`);
  }
}

export class NotFoundError extends TaskTrackerError {
  readonly code = 'TASK_NOT_FOUND';

  constructor(readonly taskId: number) {
    super(`Task ${taskId} not found`);
  }
}

export class BulkLimitExceededError extends TaskTrackerError {
  readonly code = 'BULK_LIMIT_EXCEEDED';

  constructor(readonly limit: number, readonly received: number) {
    super(`Maximum ${limit} tasks per bulk operation (received ${received})`);
  }
}
