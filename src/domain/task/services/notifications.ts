import type { AnalyticsNotifier, TaskChangeEvent } from '../ports.js';

export const noopNotifier: AnalyticsNotifier = {
  notify: () => undefined
};

/**
 * Hand an event to the notifier on a later tick without waiting for it.
 * Sync throws and async rejections are logged and dropped.
 */
export function dispatchNotification(notifier: AnalyticsNotifier, event: TaskChangeEvent): void {
  setImmediate(() => {
    Promise.resolve()
      .then(() => notifier.notify(event))
      .catch((error: unknown) => {
        console.error(`Analytics notification failed for task ${event.taskId}:`, error);
      });
  });
}
