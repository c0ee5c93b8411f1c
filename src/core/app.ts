import type { Server } from 'http';
import { InMemoryTaskRepository } from '../infrastructure/persistence/InMemoryTaskRepository.js';
import { LoggingAnalyticsNotifier } from '../infrastructure/notifications/AnalyticsNotifier.js';
import type { AnalyticsNotifier } from '../domain/task/ports.js';
import { ApiServer } from '../infrastructure/api/server.js';
import { TaskService } from '../domain/task/services/TaskService.js';
import { TaskQueryService } from '../domain/task/services/TaskQueryService.js';
import { AnalyticsService } from '../domain/task/services/AnalyticsService.js';
import type { AnalyticsCacheShape } from '../domain/task/services/AnalyticsService.js';
import { AnalyticsCache } from '../domain/task/services/AnalyticsCache.js';
import { HealthService } from '../domain/task/services/HealthService.js';
import { systemClock } from '../domain/shared/Clock.js';
import type { Clock } from '../domain/shared/Clock.js';
import type { TaskTrackerConfig } from './config.js';

export const SERVICE_VERSION = '2.0.0';

export const DEFAULT_CONFIG: TaskTrackerConfig = {
  port: 8000,
  host: '0.0.0.0',
  statsCacheTtlSeconds: 60,
  bulkCreateLimit: 100,
  rateLimitWindowMs: 15 * 60 * 1000,
  rateLimitMax: 0,
  debug: false
};

/**
 * Collaborators the application takes from its environment
 */
export interface TaskTrackerDependencies {
  clock?: Clock;
  notifier?: AnalyticsNotifier;
}

/**
 * Main application class that wires the services and the HTTP server
 */
export class TaskTrackerApp {
  readonly config: TaskTrackerConfig;
  readonly tasks: TaskService;
  readonly queries: TaskQueryService;
  readonly analytics: AnalyticsService;
  readonly health: HealthService;
  private server: ApiServer;
  private shutdownHandlersInstalled = false;

  constructor(config?: Partial<TaskTrackerConfig>, dependencies: TaskTrackerDependencies = {}) {
    // Set default configuration
    this.config = {
      ...DEFAULT_CONFIG,
      ...config
    };

    const clock = dependencies.clock ?? systemClock;
    const notifier = dependencies.notifier ?? new LoggingAnalyticsNotifier(this.config.debug);

    // Fresh, empty state for every app instance
    const repository = new InMemoryTaskRepository();
    const statsCache = new AnalyticsCache<AnalyticsCacheShape>(clock, this.config.statsCacheTtlSeconds * 1000);

    this.tasks = new TaskService(repository, {
      clock,
      notifier,
      statsCache,
      bulkLimit: this.config.bulkCreateLimit
    });
    this.queries = new TaskQueryService(this.tasks);
    this.analytics = new AnalyticsService(this.tasks, statsCache);
    this.health = new HealthService(this.tasks, clock, SERVICE_VERSION);

    this.server = new ApiServer(
      {
        tasks: this.tasks,
        queries: this.queries,
        analytics: this.analytics,
        health: this.health
      },
      {
        rateLimitWindowMs: this.config.rateLimitWindowMs,
        rateLimitMax: this.config.rateLimitMax
      }
    );
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<Server> {
    try {
      const server = await this.server.listen(this.config.port, this.config.host);
      console.log(`Task tracker API listening on ${this.config.host}:${this.config.port}`);
      return server;
    } catch (error) {
      console.error('Failed to start API server:', error);
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.server.stop();
  }

  /**
   * Set up handlers for shutdown signals
   */
  installShutdownHandlers(): void {
    if (this.shutdownHandlersInstalled) {
      return;
    }
    this.shutdownHandlersInstalled = true;

    const shutdown = async (signal: string): Promise<void> => {
      try {
        await this.stop();
        console.log(`Shutting down gracefully (${signal}).`);
        process.exit(0);
      } catch (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    };

    // Handle termination signals
    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
  }
}
