import type { Task } from '../entities/Task.js';
import type {
  AssigneeProductivityDto,
  CategoryPerformanceDto,
  ProductivityAnalyticsDto,
  StatsSummaryDto
} from '../dtos/TaskDto.js';
import type { AnalyticsCache } from './AnalyticsCache.js';
import type { TaskSnapshotSource } from '../ports.js';

export const UNASSIGNED = 'unassigned';
export const STATS_SUMMARY_KEY = 'stats_summary';

export type AnalyticsCacheShape = {
  [STATS_SUMMARY_KEY]: StatsSummaryDto;
};

// Halves round up (0.125 -> 0.13)
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return round2(values.reduce((sum, value) => sum + value, 0) / values.length);
}

/**
 * Analytics Service
 * Summary statistics (cached) and productivity analytics (always fresh)
 */
export class AnalyticsService {
  constructor(
    private tasks: TaskSnapshotSource,
    private cache: AnalyticsCache<AnalyticsCacheShape>
  ) {}

  /**
   * Summary statistics, served from cache while the entry is live.
   * The result is frozen and shared between callers.
   */
  getSummary(): StatsSummaryDto {
    return this.cache.getOrCompute(STATS_SUMMARY_KEY, () => this.computeSummary(this.tasks.getAllTasks()));
  }

  computeSummary(tasks: Task[]): StatsSummaryDto {
    const stats: StatsSummaryDto = {
      total: tasks.length,
      by_status: {},
      by_priority: {},
      by_category: {},
      by_assignee: {},
      completion_rate: 0,
      average_estimated_hours: 0,
      average_actual_hours: 0,
      overdue_tasks: 0,
      blocked_tasks: 0
    };

    for (const task of tasks) {
      increment(stats.by_status, task.status);
      increment(stats.by_priority, task.priority);
      increment(stats.by_category, task.category);
      increment(stats.by_assignee, task.assignee ?? UNASSIGNED);
    }

    const completed = stats.by_status.completed ?? 0;
    if (stats.total > 0) {
      stats.completion_rate = round2((completed / stats.total) * 100);
    }

    stats.average_estimated_hours = average(
      tasks.flatMap((task) => (task.estimated_hours === null ? [] : [task.estimated_hours]))
    );
    stats.average_actual_hours = average(
      tasks.flatMap((task) => (task.actual_hours === null ? [] : [task.actual_hours]))
    );
    stats.blocked_tasks = stats.by_status.blocked ?? 0;

    return stats;
  }

  /**
   * Productivity analytics over the current task set
   */
  getProductivity(): ProductivityAnalyticsDto {
    const tasks = this.tasks.getAllTasks();
    const analytics: ProductivityAnalyticsDto = {
      total_estimated_hours: 0,
      total_actual_hours: 0,
      efficiency_rate: 0,
      tasks_by_assignee: {},
      completion_trend: [],
      priority_distribution: {},
      category_performance: {}
    };
    const completionsByDay = new Map<string, number>();

    for (const task of tasks) {
      const assignee = task.assignee ?? UNASSIGNED;
      const workload: AssigneeProductivityDto = analytics.tasks_by_assignee[assignee] ?? {
        total: 0,
        completed: 0,
        in_progress: 0,
        estimated_hours: 0,
        actual_hours: 0
      };
      analytics.tasks_by_assignee[assignee] = workload;

      workload.total += 1;
      if (task.status === 'completed') {
        workload.completed += 1;
      } else if (task.status === 'in_progress') {
        workload.in_progress += 1;
      }

      if (task.estimated_hours !== null) {
        workload.estimated_hours += task.estimated_hours;
        analytics.total_estimated_hours += task.estimated_hours;
      }
      if (task.actual_hours !== null) {
        workload.actual_hours += task.actual_hours;
        analytics.total_actual_hours += task.actual_hours;
      }

      increment(analytics.priority_distribution, task.priority);

      const performance: CategoryPerformanceDto = analytics.category_performance[task.category] ?? {
        total: 0,
        completed: 0,
        completion_rate: 0
      };
      analytics.category_performance[task.category] = performance;
      performance.total += 1;
      if (task.status === 'completed') {
        performance.completed += 1;
      }

      if (task.completed_at) {
        const day = task.completed_at.slice(0, 10);
        completionsByDay.set(day, (completionsByDay.get(day) ?? 0) + 1);
      }
    }

    for (const performance of Object.values(analytics.category_performance)) {
      performance.completion_rate = round2((performance.completed / performance.total) * 100);
    }

    analytics.completion_trend = Array.from(completionsByDay.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, completed]) => ({ date, completed }));

    if (analytics.total_estimated_hours > 0 && analytics.total_actual_hours > 0) {
      analytics.efficiency_rate = round2(
        (analytics.total_estimated_hours / analytics.total_actual_hours) * 100
      );
    }

    return analytics;
  }
}
