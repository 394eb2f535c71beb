import path from 'path';
import { buildBaseConfig, getConfig } from '../config/env.config';
import { DEFAULT_VOCABULARY_PATH } from '../config/vocabulary.config';

describe('Environment config', () => {
  test('should apply defaults', () => {
    const config = buildBaseConfig({});
    expect(config).toEqual({
      port: 9988,
      awsRegion: 'us-east-1',
      databasePath: './data/metadata-cache.db',
      vocabularyPath: DEFAULT_VOCABULARY_PATH,
      tmdbBaseUrl: 'https://api.themoviedb.org/3',
      tmdbLanguage: 'en-US',
      tmdbTimeoutMs: 10000,
      tmdbRequestsPerSecond: 10,
      cacheTtlSeconds: 3600,
      cachePurgeCronSchedule: '0 * * * *',
      resolveConcurrency: 4,
      enableExternalResolution: true,
      titleStrategy: { preferOriginal: true, includeSubtitle: true, preserveBrackets: false },
      preferFilenameOriginalTitle: true,
      coalesceRequests: false,
      fetchProviderDetails: false,
      minConfidenceThreshold: 0.7,
    });
  });

  test('should read overrides', () => {
    const config = buildBaseConfig({
      PORT: '8080',
      VOCABULARY_PATH: 'custom/vocabulary.json',
      CACHE_TTL_SECONDS: '60',
      RESOLVE_CONCURRENCY: '0',
      COALESCE_REQUESTS: 'yes',
      ENABLE_EXTERNAL_RESOLUTION: 'false',
      PREFER_ORIGINAL_TITLE: 'false',
      PRESERVE_BRACKETS: '1',
      MIN_CONFIDENCE_THRESHOLD: '0.85',
    });
    expect(config.port).toBe(8080);
    expect(config.vocabularyPath).toBe(path.resolve('custom/vocabulary.json'));
    expect(config.cacheTtlSeconds).toBe(60);
    expect(config.resolveConcurrency).toBe(1);
    expect(config.coalesceRequests).toBe(true);
    expect(config.enableExternalResolution).toBe(false);
    expect(config.titleStrategy).toEqual({ preferOriginal: false, includeSubtitle: true, preserveBrackets: true });
    expect(config.minConfidenceThreshold).toBe(0.85);
  });

  test('should ignore malformed numbers and blank flags', () => {
    const config = buildBaseConfig({ TMDB_TIMEOUT_MS: 'abc', INCLUDE_SUBTITLE: ' ' });
    expect(config.tmdbTimeoutMs).toBe(10000);
    expect(config.titleStrategy.includeSubtitle).toBe(true);
  });

  test('should refuse access before initialization', () => {
    expect(() => getConfig()).toThrow('Config not initialized. Call initConfig() first.');
  });
});
