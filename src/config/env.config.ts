import dotenv from 'dotenv';
import path from 'path';
import { secretsService } from '../services/secrets.service';
import { DEFAULT_VOCABULARY_PATH } from './vocabulary.config';
import { TitleStrategy } from '../types/metadata.types';

dotenv.config();

export interface EnvConfig {
  port: number;
  awsRegion: string;
  databasePath: string;
  vocabularyPath: string;
  tmdbApiKey: string;
  tmdbBaseUrl: string;
  tmdbLanguage: string;
  tmdbTimeoutMs: number;
  tmdbRequestsPerSecond: number;
  cacheTtlSeconds: number;
  cachePurgeCronSchedule: string;
  resolveConcurrency: number;
  enableExternalResolution: boolean;
  titleStrategy: TitleStrategy;
  preferFilenameOriginalTitle: boolean;
  coalesceRequests: boolean;
  fetchProviderDetails: boolean;
  minConfidenceThreshold: number;
}

export type BaseConfig = Omit<EnvConfig, 'tmdbApiKey'>;

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

// Non-sensitive config that can be loaded synchronously from .env
export function buildBaseConfig(env: NodeJS.ProcessEnv): BaseConfig {
  return {
    port: parseInt(env.PORT || '9988', 10),
    awsRegion: env.AWS_REGION || 'us-east-1',
    databasePath: env.DATABASE_PATH || './data/metadata-cache.db',
    vocabularyPath: env.VOCABULARY_PATH ? path.resolve(env.VOCABULARY_PATH) : DEFAULT_VOCABULARY_PATH,
    tmdbBaseUrl: env.TMDB_BASE_URL || 'https://api.themoviedb.org/3',
    tmdbLanguage: env.TMDB_LANGUAGE || 'en-US',
    tmdbTimeoutMs: readNumber(env.TMDB_TIMEOUT_MS, 10000),
    tmdbRequestsPerSecond: readNumber(env.TMDB_REQUESTS_PER_SECOND, 10),
    cacheTtlSeconds: readNumber(env.CACHE_TTL_SECONDS, 3600),
    cachePurgeCronSchedule: env.CACHE_PURGE_CRON_SCHEDULE || '0 * * * *',
    resolveConcurrency: Math.max(1, readNumber(env.RESOLVE_CONCURRENCY, 4)),
    enableExternalResolution: readBoolean(env.ENABLE_EXTERNAL_RESOLUTION, true),
    titleStrategy: {
      preferOriginal: readBoolean(env.PREFER_ORIGINAL_TITLE, true),
      includeSubtitle: readBoolean(env.INCLUDE_SUBTITLE, true),
      preserveBrackets: readBoolean(env.PRESERVE_BRACKETS, false),
    },
    preferFilenameOriginalTitle: readBoolean(env.PREFER_FILENAME_ORIGINAL_TITLE, true),
    coalesceRequests: readBoolean(env.COALESCE_REQUESTS, false),
    fetchProviderDetails: readBoolean(env.FETCH_PROVIDER_DETAILS, false),
    minConfidenceThreshold: readNumber(env.MIN_CONFIDENCE_THRESHOLD, 0.7),
  };
}

const baseConfig = buildBaseConfig(process.env);

// Full config that requires secrets - will be populated by initConfig()
let fullConfig: EnvConfig | null = null;

/**
 * Initialize configuration by loading secrets from AWS Secrets Manager
 * Must be called before using the config
 */
export async function initConfig(): Promise<EnvConfig> {
  if (fullConfig) {
    return fullConfig;
  }

  const secrets = await secretsService.getSecrets();

  fullConfig = {
    ...baseConfig,
    tmdbApiKey: secrets.TMDB_API_KEY,
  };

  return fullConfig;
}

/**
 * Get the current config (throws if not initialized)
 */
export function getConfig(): EnvConfig {
  if (!fullConfig) {
    throw new Error('Config not initialized. Call initConfig() first.');
  }
  return fullConfig;
}
