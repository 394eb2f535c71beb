import express, { Request, Response } from 'express';
import cors from 'cors';
import { initConfig, getConfig } from './config/env.config';
import { loadVocabulary } from './config/vocabulary.config';
import { TaskRunner } from './tasks/task-runner';
import { CachePurgeTask } from './tasks/cache-purge.task';
import { Scheduler } from './utils/scheduler.util';
import { MetadataController } from './controllers/metadata.controller';
import { DatabaseConnection } from './models/database';
import { CacheRepository } from './repositories/cache.repository';
import { ResolutionCache } from './services/resolution-cache.service';
import { ResolutionEngine } from './services/resolution-engine.service';
import { TMDbService } from './services/tmdb.service';
import { MetadataMergerService } from './services/metadata-merger.service';
import { MovieMetadataService } from './services/movie-metadata.service';
import { MovieNameParser } from './utils/movie-name-parser.util';
import { ConfigurationError } from './utils/errors.util';

const app = express();

app.use(cors());
app.use(express.json());

async function bootstrap() {
  // Load secrets from AWS Secrets Manager (or local .env fallback)
  await initConfig();
  const config = getConfig();

  // Bad vocabulary aborts startup
  const vocabulary = loadVocabulary(config.vocabularyPath);

  const cache = new ResolutionCache(new CacheRepository(DatabaseConnection.getInstance()), config.cacheTtlSeconds);
  const provider = new TMDbService({
    apiKey: config.tmdbApiKey,
    baseUrl: config.tmdbBaseUrl,
    language: config.tmdbLanguage,
    timeoutMs: config.tmdbTimeoutMs,
    requestsPerSecond: config.tmdbRequestsPerSecond,
  });
  const engine = new ResolutionEngine(provider, cache, {
    vocabulary,
    coalesceRequests: config.coalesceRequests,
    fetchDetails: config.fetchProviderDetails,
  });
  const parser = new MovieNameParser(vocabulary, config.titleStrategy);
  const service = new MovieMetadataService(parser, {
    engine,
    cache,
    merger: new MetadataMergerService({
      titleStrategy: config.titleStrategy,
      preferFilenameOriginalTitle: config.preferFilenameOriginalTitle,
    }),
    enableExternalResolution: config.enableExternalResolution,
    concurrency: config.resolveConcurrency,
  });

  const taskRunner = new TaskRunner();
  taskRunner.registerTask(new CachePurgeTask(cache));

  const scheduler = new Scheduler(taskRunner);
  scheduler.scheduleCachePurge(config.cachePurgeCronSchedule);

  const controller = new MetadataController(service, taskRunner, cache, config.minConfidenceThreshold);

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      name: 'Media Metadata Resolver API',
      version: '1.0.0',
      endpoints: {
        'GET /': 'API information',
        'POST /api/parse': 'Parse a filename locally (body: { filename })',
        'POST /api/resolve': 'Parse and resolve against TMDb (body: { filename } or { filenames, concurrency? })',
        'GET /api/cache/stats': 'Resolution cache statistics',
        'DELETE /api/cache': 'Clear the resolution cache',
        'GET /api/tasks': 'Registered tasks and their last run',
        'POST /api/tasks/:name/run': 'Run a task now',
        'GET /health': 'Health check',
      },
    });
  });

  app.post('/api/parse', controller.parse);
  app.post('/api/resolve', controller.resolve);
  app.get('/api/cache/stats', controller.getCacheStats);
  app.delete('/api/cache', controller.clearCache);
  app.get('/api/tasks', controller.getTasks);
  app.post('/api/tasks/:name/run', controller.runTask);

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ success: true, status: 'healthy', timestamp: new Date().toISOString() });
  });

  const server = app.listen(config.port, () => {
    console.log('='.repeat(50));
    console.log('Media Metadata Resolver');
    console.log('='.repeat(50));
    console.log(`Server running on port: ${config.port}`);
    console.log(`API URL: http://localhost:${config.port}`);
    console.log(`External resolution: ${service.resolutionEnabled ? 'enabled' : 'disabled'}`);
    console.log(`Cache TTL: ${config.cacheTtlSeconds}s, purge schedule: ${config.cachePurgeCronSchedule}`);
    console.log('='.repeat(50));
  });

  const gracefulShutdown = () => {
    console.log('\nShutting down gracefully...');
    scheduler.stopAll();
    DatabaseConnection.close();
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
}

// Start the application
bootstrap().catch((error) => {
  if (error instanceof ConfigurationError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error('Failed to start application:', error);
  }
  process.exit(1);
});
