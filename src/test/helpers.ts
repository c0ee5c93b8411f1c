import type { Clock } from '../domain/shared/Clock.js';
import type { AnalyticsNotifier, TaskChangeEvent } from '../domain/task/ports.js';
import { InMemoryTaskRepository } from '../infrastructure/persistence/InMemoryTaskRepository.js';
import { AnalyticsCache } from '../domain/task/services/AnalyticsCache.js';
import { AnalyticsService } from '../domain/task/services/AnalyticsService.js';
import type { AnalyticsCacheShape } from '../domain/task/services/AnalyticsService.js';
import { TaskQueryService } from '../domain/task/services/TaskQueryService.js';
import { TaskService } from '../domain/task/services/TaskService.js';

export const START_TIME = '2025-03-01T09:00:00.000Z';

/**
 * Clock that only moves when told to
 */
export class FakeClock implements Clock {
  private current: number;

  constructor(start: string = START_TIME) {
    this.current = Date.parse(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class RecordingNotifier implements AnalyticsNotifier {
  events: TaskChangeEvent[] = [];

  notify(event: TaskChangeEvent): void {
    this.events.push(event);
  }
}

/**
 * Let queued setImmediate callbacks and their promise chains run
 */
export async function flushNotifications(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
  await new Promise((resolve) => setImmediate(resolve));
}

export function createServices(options: { notifier?: AnalyticsNotifier; ttlSeconds?: number; bulkLimit?: number } = {}) {
  const clock = new FakeClock();
  const notifier = options.notifier ?? new RecordingNotifier();
  const repository = new InMemoryTaskRepository();
  const cache = new AnalyticsCache<AnalyticsCacheShape>(clock, (options.ttlSeconds ?? 60) * 1000);
  const tasks = new TaskService(repository, {
    clock,
    notifier,
    statsCache: cache,
    bulkLimit: options.bulkLimit
  });

  return {
    clock,
    notifier,
    repository,
    cache,
    tasks,
    queries: new TaskQueryService(tasks),
    analytics: new AnalyticsService(tasks, cache)
  };
}
