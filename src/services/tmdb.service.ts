import axios, { AxiosInstance } from 'axios';
import { getConfig } from '../config/env.config';
import { TMDB_DEFAULTS } from '../config/constants';
import { ExternalCandidate, MetadataProvider } from '../types/provider.types';
import { describeError, ProviderError } from '../utils/errors.util';

// TMDb API v3: https://developer.themoviedb.org/reference/search-movie

interface TMDbMovie {
  id: number;
  title: string;
  original_title?: string;
  original_language?: string;
  release_date?: string;
  popularity?: number;
  vote_average?: number;
  vote_count?: number;
}

interface TMDbSearchResponse {
  results: TMDbMovie[];
  total_results: number;
}

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface TMDbServiceOptions {
  apiKey?: string;
  baseUrl?: string;
  language?: string;
  timeoutMs?: number;
  /** 0 disables request spacing */
  requestsPerSecond?: number;
  http?: HttpClient;
}

function isTMDbMovie(value: unknown): value is TMDbMovie {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'title' in value &&
    typeof value.title === 'string'
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TMDbService implements MetadataProvider {
  private readonly baseUrl: string;
  private readonly language: string;
  private readonly timeoutMs: number;
  private readonly minIntervalMs: number;
  private readonly http: HttpClient;
  private readonly explicitApiKey?: string;
  private nextRequestAt = 0;

  constructor(options: TMDbServiceOptions = {}) {
    this.baseUrl = options.baseUrl ?? TMDB_DEFAULTS.BASE_URL;
    this.language = options.language ?? TMDB_DEFAULTS.LANGUAGE;
    this.timeoutMs = options.timeoutMs ?? TMDB_DEFAULTS.TIMEOUT_MS;
    const rps = options.requestsPerSecond ?? TMDB_DEFAULTS.REQUESTS_PER_SECOND;
    this.minIntervalMs = rps > 0 ? 1000 / rps : 0;
    this.http = options.http ?? axios;
    this.explicitApiKey = options.apiKey;
  }

  private get apiKey(): string {
    return this.explicitApiKey ?? getConfig().tmdbApiKey;
  }

  async search(title: string, year?: number): Promise<ExternalCandidate[]> {
    console.log(`🎬 TMDb search: "${title}"${year ? ` (${year})` : ''}`);

    const params: Record<string, string | number | boolean> = {
      api_key: this.apiKey,
      query: title,
      language: this.language,
      include_adult: false,
    };
    if (year !== undefined) {
      params.year = year;
    }

    const data = await this.request<TMDbSearchResponse>(`${this.baseUrl}/search/movie`, params);
    if (typeof data !== 'object' || data === null || !Array.isArray(data.results)) {
      throw new ProviderError('parse', 'TMDb search response has no results array');
    }

    const candidates = data.results.filter(isTMDbMovie).map((movie) => this.toCandidate(movie));
    console.log(`  ${candidates.length > 0 ? '✓' : '✗'} ${candidates.length} result(s)`);
    return candidates;
  }

  async getById(id: number): Promise<ExternalCandidate> {
    const data = await this.request<TMDbMovie>(`${this.baseUrl}/movie/${id}`, {
      api_key: this.apiKey,
      language: this.language,
    });

    if (!isTMDbMovie(data)) {
      throw new ProviderError('parse', `TMDb movie ${id} response is malformed`);
    }
    return this.toCandidate(data);
  }

  private async request<T>(url: string, params: Record<string, string | number | boolean>): Promise<T> {
    await this.throttle();
    try {
      const response = await this.http.get<T>(url, { params, timeout: this.timeoutMs });
      return response.data;
    } catch (error) {
      const providerError = this.toProviderError(error);
      console.error(`  ✗ TMDb error (${providerError.kind}): ${providerError.message}`);
      throw providerError;
    }
  }

  // Spaces requests to stay under the provider's per-second limit
  private async throttle(): Promise<void> {
    if (this.minIntervalMs === 0) return;
    const now = Date.now();
    const wait = Math.max(0, this.nextRequestAt - now);
    this.nextRequestAt = Math.max(now, this.nextRequestAt) + this.minIntervalMs;
    if (wait > 0) {
      await sleep(wait);
    }
  }

  private toProviderError(error: unknown): ProviderError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === 401 || status === 403) {
        return new ProviderError('auth', 'TMDb rejected the API key', status);
      }
      if (status === 429) {
        return new ProviderError('rate-limit', 'TMDb rate limit exceeded', status);
      }
      if (status !== undefined) {
        return new ProviderError('http', `TMDb responded with HTTP ${status}`, status);
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new ProviderError('timeout', `TMDb request timed out after ${this.timeoutMs}ms`);
      }
      return new ProviderError('network', error.message);
    }
    return new ProviderError('network', describeError(error));
  }

  private toCandidate(movie: TMDbMovie): ExternalCandidate {
    return {
      providerId: movie.id,
      title: movie.title,
      originalTitle: movie.original_title || undefined,
      originalLanguage: movie.original_language || undefined,
      releaseDate: movie.release_date || undefined,
      popularity: movie.popularity ?? 0,
      voteAverage: movie.vote_average ?? 0,
      voteCount: movie.vote_count ?? 0,
    };
  }
}
