/**
 * Task Data Transfer Objects
 * Shapes returned to callers of the task services
 */

/**
 * Result of deleting a task
 */
export interface DeleteTaskResultDto {
  affectedCount: number;
}

/**
 * Summary statistics over every task
 */
export interface StatsSummaryDto {
  total: number;
  by_status: Record<string, number>;
  by_priority: Record<string, number>;
  by_category: Record<string, number>;
  by_assignee: Record<string, number>;
  completion_rate: number;
  average_estimated_hours: number;
  average_actual_hours: number;
  overdue_tasks: number;
  blocked_tasks: number;
}

/**
 * Per-assignee workload
 */
export interface AssigneeProductivityDto {
  total: number;
  completed: number;
  in_progress: number;
  estimated_hours: number;
  actual_hours: number;
}

/**
 * Per-category completion figures
 */
export interface CategoryPerformanceDto {
  total: number;
  completed: number;
  completion_rate: number;
}

/**
 * Completions on a single UTC day
 */
export interface CompletionTrendPointDto {
  date: string;
  completed: number;
}

/**
 * Productivity analytics
 */
export interface ProductivityAnalyticsDto {
  total_estimated_hours: number;
  total_actual_hours: number;
  efficiency_rate: number;
  tasks_by_assignee: Record<string, AssigneeProductivityDto>;
  completion_trend: CompletionTrendPointDto[];
  priority_distribution: Record<string, number>;
  category_performance: Record<string, CategoryPerformanceDto>;
}

/**
 * Service health snapshot
 */
export interface HealthDto {
  status: 'healthy';
  timestamp: string;
  version: string;
  uptime_seconds: number;
  total_tasks: number;
  memory_usage_mb: number;
}
