import crypto from 'crypto';
import { z } from 'zod';
import { CACHE_KEY_PREFIX, DEFAULT_CACHE_TTL_SECONDS } from '../config/constants';
import { CacheStats, CacheStore } from '../types/cache.types';
import { ParseResult } from '../types/metadata.types';
import { ResolutionQuery, ResolutionStrategy, ScoredCandidate } from '../types/provider.types';
import { CacheError, describeError } from '../utils/errors.util';

export interface CachedResolution {
  /** null records a completed lookup that found nothing */
  strategy: ResolutionStrategy | null;
  candidates: ScoredCandidate[];
}

const candidateSchema = z.object({
  providerId: z.number(),
  title: z.string(),
  originalTitle: z.string().optional(),
  originalLanguage: z.string().optional(),
  releaseDate: z.string().optional(),
  popularity: z.number(),
  voteAverage: z.number(),
  voteCount: z.number(),
  matchScore: z.number(),
  matchType: z.enum(['exact', 'fuzzy', 'year-adjusted', 'title-variation']),
});

const strategySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exact') }),
  z.object({ kind: z.literal('no-year') }),
  z.object({ kind: z.literal('cleaned-title'), title: z.string() }),
  z.object({ kind: z.literal('variation'), title: z.string() }),
]);

const cachedResolutionSchema = z.object({
  strategy: strategySchema.nullable(),
  candidates: z.array(candidateSchema),
});

const parseResultSchema = z.object({
  metadata: z.object({
    title: z.string(),
    originalTitle: z.string().optional(),
    year: z.number().int().optional(),
    quality: z.string().optional(),
    source: z.string().optional(),
    language: z.string().optional(),
    audio: z.string().optional(),
    codec: z.string().optional(),
    releaseGroup: z.string().optional(),
    confidence: z.number().min(0).max(1),
  }),
  parsingMethod: z.enum([
    'local',
    'cache',
    'provider:exact',
    'provider:no-year',
    'provider:cleaned-title',
    'provider:variation',
    'local:no-match',
    'local:provider-error',
  ]),
  warnings: z.array(z.string()),
  series: z.object({ name: z.string(), number: z.number() }).optional(),
  providerId: z.number().optional(),
});

export function normalizeQueryTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * TTL cache in front of the provider. Keys are pure functions of the query:
 * "tmdb:<normalized title>:<year or 0>" for lookups and "parse:<md5 of filename>" for parse results.
 * Store failures are logged and read as misses.
 */
export class ResolutionCache {
  private stats = { hits: 0, misses: 0, writes: 0, errors: 0 };

  constructor(
    private readonly store: CacheStore,
    private readonly ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS
  ) {}

  static queryKey(query: ResolutionQuery): string {
    return `${CACHE_KEY_PREFIX.RESOLUTION}${normalizeQueryTitle(query.title)}:${query.year ?? 0}`;
  }

  static filenameKey(filename: string): string {
    const hash = crypto.createHash('md5').update(filename.trim()).digest('hex');
    return `${CACHE_KEY_PREFIX.PARSE}${hash}`;
  }

  getResolution(query: ResolutionQuery): CachedResolution | undefined {
    return this.read(ResolutionCache.queryKey(query), cachedResolutionSchema);
  }

  putResolution(query: ResolutionQuery, value: CachedResolution): void {
    this.write(ResolutionCache.queryKey(query), value);
  }

  getParsed(filename: string): ParseResult | undefined {
    return this.read(ResolutionCache.filenameKey(filename), parseResultSchema);
  }

  putParsed(filename: string, value: ParseResult): void {
    this.write(ResolutionCache.filenameKey(filename), value);
  }

  clear(): void {
    try {
      this.store.clear();
      console.log('💾 Cache cleared');
    } catch (error) {
      this.fail(new CacheError('Failed to clear cache', { cause: error }));
    }
  }

  purgeExpired(): number {
    try {
      return this.store.purgeExpired();
    } catch (error) {
      this.fail(new CacheError('Failed to purge expired entries', { cause: error }));
      return 0;
    }
  }

  getStats(): CacheStats {
    let entries = 0;
    try {
      entries = this.store.size();
    } catch (error) {
      this.fail(new CacheError('Failed to count cache entries', { cause: error }));
    }
    return { ...this.stats, entries };
  }

  private read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    let payload: string | undefined;
    try {
      payload = this.store.get(key);
    } catch (error) {
      this.fail(new CacheError(`Cache read failed for ${key}`, { cause: error }));
      this.stats.misses++;
      return undefined;
    }

    if (payload === undefined) {
      this.stats.misses++;
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      this.fail(new CacheError(`Cached payload for ${key} is not valid JSON`, { cause: error }));
      this.stats.misses++;
      return undefined;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      this.fail(new CacheError(`Cached payload for ${key} has an unexpected shape`));
      this.stats.misses++;
      return undefined;
    }

    this.stats.hits++;
    console.log(`💾 Cache hit: ${key}`);
    return parsed.data;
  }

  private write(key: string, value: unknown): void {
    try {
      this.store.put(key, JSON.stringify(value), this.ttlSeconds);
      this.stats.writes++;
    } catch (error) {
      this.fail(new CacheError(`Cache write failed for ${key}`, { cause: error }));
    }
  }

  private fail(error: CacheError): void {
    this.stats.errors++;
    const cause = error.cause === undefined ? '' : `: ${describeError(error.cause)}`;
    console.warn(`💾 ${error.message}${cause}`);
  }
}
