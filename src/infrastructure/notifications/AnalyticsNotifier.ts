import type { AnalyticsNotifier, TaskChangeEvent } from '../../domain/task/ports.js';

/**
 * Default notifier: records the refresh request in the log
 */
export class LoggingAnalyticsNotifier implements AnalyticsNotifier {
  constructor(private debug: boolean = false) {}

  notify(event: TaskChangeEvent): void {
    if (this.debug) {
      console.log(`Analytics refresh queued for task ${event.taskId} (${event.type})`);
    }
  }
}
