import { Request, Response } from 'express';
import { z } from 'zod';
import { MovieMetadataService } from '../services/movie-metadata.service';
import { ResolutionCache } from '../services/resolution-cache.service';
import { TaskRunner } from '../tasks/task-runner';
import { isHighConfidence } from '../utils/confidence.util';
import { describeError, InputError } from '../utils/errors.util';

const parseBodySchema = z.object({
  filename: z.string(),
});

const resolveBodySchema = z.union([
  z.object({ filename: z.string() }),
  z.object({
    filenames: z.array(z.string()).min(1).max(500),
    concurrency: z.number().int().min(1).max(32).optional(),
  }),
]);

export interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

export class MetadataController {
  private service: MovieMetadataService;
  private cache?: ResolutionCache;
  private taskRunner: TaskRunner;
  private confidenceThreshold: number;

  constructor(
    service: MovieMetadataService,
    taskRunner: TaskRunner,
    cache?: ResolutionCache,
    confidenceThreshold = 0.7
  ) {
    this.service = service;
    this.taskRunner = taskRunner;
    this.cache = cache;
    this.confidenceThreshold = confidenceThreshold;
  }

  parse = async (req: Request, res: Response): Promise<void> => {
    this.send(res, this.handleParse(req.body));
  };

  resolve = async (req: Request, res: Response): Promise<void> => {
    this.send(res, await this.handleResolve(req.body));
  };

  getCacheStats = async (_req: Request, res: Response): Promise<void> => {
    this.send(res, this.handleCacheStats());
  };

  clearCache = async (_req: Request, res: Response): Promise<void> => {
    this.send(res, this.handleClearCache());
  };

  getTasks = async (_req: Request, res: Response): Promise<void> => {
    this.send(res, this.handleGetTasks());
  };

  runTask = async (req: Request, res: Response): Promise<void> => {
    this.send(res, await this.handleRunTask(req.params.name));
  };

  handleParse(body: unknown): ApiResponse {
    const parsed = parseBodySchema.safeParse(body);
    if (!parsed.success) {
      return { status: 400, body: { success: false, error: 'Body must be { "filename": string }' } };
    }

    try {
      const result = this.service.parseLocal(parsed.data.filename);
      return {
        status: 200,
        body: {
          success: true,
          result,
          highConfidence: isHighConfidence(result.metadata.confidence, this.confidenceThreshold),
        },
      };
    } catch (error) {
      return this.errorResponse(error, 'Failed to parse filename');
    }
  }

  async handleResolve(body: unknown): Promise<ApiResponse> {
    const parsed = resolveBodySchema.safeParse(body);
    if (!parsed.success) {
      return {
        status: 400,
        body: {
          success: false,
          error: 'Body must be { "filename": string } or { "filenames": string[], "concurrency"?: number }',
        },
      };
    }

    try {
      if ('filename' in parsed.data) {
        const result = await this.service.process(parsed.data.filename);
        return {
          status: 200,
          body: {
            success: true,
            result,
            highConfidence: isHighConfidence(result.metadata.confidence, this.confidenceThreshold),
          },
        };
      }

      const items = await this.service.processBatch(parsed.data.filenames, parsed.data.concurrency);
      return { status: 200, body: { success: true, count: items.length, items } };
    } catch (error) {
      return this.errorResponse(error, 'Failed to resolve filename');
    }
  }

  handleCacheStats(): ApiResponse {
    if (!this.cache) {
      return { status: 200, body: { success: true, enabled: false } };
    }
    return { status: 200, body: { success: true, enabled: true, stats: this.cache.getStats() } };
  }

  handleClearCache(): ApiResponse {
    if (!this.cache) {
      return { status: 404, body: { success: false, error: 'Cache is disabled' } };
    }
    this.cache.clear();
    return { status: 200, body: { success: true, message: 'Cache cleared' } };
  }

  handleGetTasks(): ApiResponse {
    const tasks = this.taskRunner.getRegisteredTasks().map((name) => ({
      name,
      lastRun: this.taskRunner.getLastRun(name) ?? null,
    }));
    return { status: 200, body: { success: true, tasks } };
  }

  async handleRunTask(taskName: string): Promise<ApiResponse> {
    if (!this.taskRunner.getRegisteredTasks().includes(taskName)) {
      return { status: 404, body: { success: false, error: `Task not found: ${taskName}` } };
    }

    try {
      await this.taskRunner.executeTask(taskName);
      return { status: 200, body: { success: true, lastRun: this.taskRunner.getLastRun(taskName) } };
    } catch (error) {
      return { status: 500, body: { success: false, error: describeError(error) } };
    }
  }

  private send(res: Response, response: ApiResponse): void {
    res.status(response.status).json(response.body);
  }

  private errorResponse(error: unknown, fallback: string): ApiResponse {
    if (error instanceof InputError) {
      return { status: 422, body: { success: false, error: error.message } };
    }
    console.error(`${fallback}:`, error);
    return { status: 500, body: { success: false, error: fallback } };
  }
}
