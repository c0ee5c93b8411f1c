import type { HealthDto } from '../dtos/TaskDto.js';
import type { Clock } from '../../shared/Clock.js';
import type { TaskSnapshotSource } from '../ports.js';
import { round2 } from './AnalyticsService.js';

/**
 * Reports uptime and the approximate size of the task store
 */
export class HealthService {
  private startedAt: number;

  constructor(
    private tasks: TaskSnapshotSource,
    private clock: Clock,
    private version: string
  ) {
    this.startedAt = clock.now().getTime();
  }

  getHealth(): HealthDto {
    const now = this.clock.now();
    const tasks = this.tasks.getAllTasks();
    // Serialized size stands in for memory footprint
    const bytes = Buffer.byteLength(JSON.stringify(tasks), 'utf8');

    return {
      status: 'healthy',
      timestamp: now.toISOString(),
      version: this.version,
      uptime_seconds: (now.getTime() - this.startedAt) / 1000,
      total_tasks: tasks.length,
      memory_usage_mb: round2(bytes / 1024 / 1024)
    };
  }
}
