import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import bodyParser from 'body-parser';
import { v4 as uuidv4 } from 'uuid';
import type { TaskService } from '../../domain/task/services/TaskService.js';
import type { TaskQueryService } from '../../domain/task/services/TaskQueryService.js';
import type { AnalyticsService } from '../../domain/task/services/AnalyticsService.js';
import type { HealthService } from '../../domain/task/services/HealthService.js';
import {
  NotFoundError,
  TaskTrackerError,
  ValidationError
} from '../../domain/task/errors.js';
import {
  listTasksQuerySchema,
  parseOrThrow,
  taskIdSchema
} from '../../application/schemas/taskSchemas.js';

export interface ApiServices {
  tasks: TaskService;
  queries: TaskQueryService;
  analytics: AnalyticsService;
  health: HealthService;
}

export interface ApiServerOptions {
  rateLimitWindowMs?: number;
  /**
   * Requests per window per client; 0 disables the limiter
   */
  rateLimitMax?: number;
}

const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * HTTP status for a domain error
 */
export function statusForError(error: TaskTrackerError): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ValidationError) return 422;
  // DependencyNotFoundError, BulkLimitExceededError
  return 400;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

function parseTaskId(raw: string): number {
  return parseOrThrow(taskIdSchema, raw, 'task id');
}

export class ApiServer {
  private app: express.Application;
  private server?: Server;

  constructor(private services: ApiServices, private options: ApiServerOptions = {}) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    // Security middleware
    this.app.use(helmet());
    this.app.use(cors());

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const incoming = req.header(REQUEST_ID_HEADER);
      const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
      res.locals.requestId = requestId;
      res.setHeader(REQUEST_ID_HEADER, requestId);
      next();
    });

    const max = this.options.rateLimitMax ?? 0;
    if (max > 0) {
      this.app.use(rateLimit({
        windowMs: this.options.rateLimitWindowMs ?? 15 * 60 * 1000,
        limit: max,
        standardHeaders: true,
        legacyHeaders: false
      }));
    }

    // Parse JSON bodies
    this.app.use(bodyParser.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    const { tasks, queries, analytics, health } = this.services;

    this.app.get('/health', (req: Request, res: Response) => {
      res.status(200).json(health.getHealth());
    });

    this.app.get('/tasks', (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = parseOrThrow(listTasksQuerySchema, req.query, 'task query');
        res.status(200).json(queries.listTasks(query));
      } catch (error) {
        next(error);
      }
    });

    // Registered before /tasks/:id so the literal paths win
    this.app.get('/tasks/stats/summary', (req: Request, res: Response) => {
      res.status(200).json(analytics.getSummary());
    });

    this.app.get('/tasks/analytics/productivity', (req: Request, res: Response) => {
      res.status(200).json(analytics.getProductivity());
    });

    this.app.get('/tasks/:id', (req: Request, res: Response, next: NextFunction) => {
      try {
        res.status(200).json(tasks.getTask(parseTaskId(req.params.id)));
      } catch (error) {
        next(error);
      }
    });

    this.app.post('/tasks', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const task = await tasks.createTask(req.body);
        res.status(201).json(task);
      } catch (error) {
        next(error);
      }
    });

    this.app.post('/tasks/bulk', async (req: Request, res: Response, next: NextFunction) => {
      try {
        if (!Array.isArray(req.body)) {
          throw new ValidationError('Invalid bulk request: body must be an array of tasks', [
            { path: '', message: 'Expected array' }
          ]);
        }
        const created = await tasks.bulkCreateTasks(req.body);
        res.status(201).json({
          message: `Successfully created ${created.length} tasks`,
          task_ids: created.map((task) => task.id)
        });
      } catch (error) {
        next(error);
      }
    });

    this.app.put('/tasks/:id', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const task = await tasks.updateTask(parseTaskId(req.params.id), req.body ?? {});
        res.status(200).json(task);
      } catch (error) {
        next(error);
      }
    });

    this.app.delete('/tasks/:id', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { affectedCount } = await tasks.deleteTask(parseTaskId(req.params.id));
        res.status(200).json({
          message: 'Task deleted successfully',
          affected_tasks: affectedCount
        });
      } catch (error) {
        next(error);
      }
    });
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Route not found', code: 'ROUTE_NOT_FOUND' });
    });

    // Express recognizes error handlers by their four parameters
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof TaskTrackerError) {
        res.status(statusForError(error)).json({
          error: error.message,
          code: error.code,
          ...(error instanceof ValidationError ? { details: error.issues } : {})
        });
        return;
      }

      const clientStatus = clientErrorStatus(error);
      if (clientStatus !== undefined) {
        res.status(clientStatus).json({ error: 'Malformed request body', code: 'BAD_REQUEST' });
        return;
      }

      console.error(`Unhandled error on ${req.method} ${req.path} [${res.locals.requestId}]:`, error);
      res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    });
  }

  /**
   * Start listening. Resolves once the port is bound.
   */
  public listen(port: number, host?: string): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = host ? this.app.listen(port, host) : this.app.listen(port);
      server.once('listening', () => {
        this.server = server;
        resolve(server);
      });
      server.once('error', reject);
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
