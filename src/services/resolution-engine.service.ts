import { TechnicalVocabulary } from '../config/vocabulary.config';
import {
  MetadataProvider,
  ResolutionOutcome,
  ResolutionQuery,
  ResolutionStrategy,
  ScoredCandidate,
} from '../types/provider.types';
import { describeError } from '../utils/errors.util';
import { CachedResolution, normalizeQueryTitle, ResolutionCache } from './resolution-cache.service';
import { TitleMatcherService } from './title-matcher.service';

export type TitleCleaningVocabulary = Pick<TechnicalVocabulary, 'editionSuffixes' | 'leadingArticles'>;

export interface ResolutionEngineOptions {
  vocabulary: TitleCleaningVocabulary;
  /** Join concurrent lookups for the same key onto one provider round trip */
  coalesceRequests?: boolean;
  /** Re-read the winning candidate with getById */
  fetchDetails?: boolean;
  matcher?: TitleMatcherService;
}

interface Attempt {
  strategy: ResolutionStrategy;
  query: ResolutionQuery;
}

// Ranked candidates kept alongside the winner in the cache
const CACHED_CANDIDATES = 5;

export function describeStrategy(strategy: ResolutionStrategy): string {
  switch (strategy.kind) {
    case 'exact':
      return 'exact title + year';
    case 'no-year':
      return 'title without year';
    case 'cleaned-title':
      return `cleaned title "${strategy.title}"`;
    case 'variation':
      return `variation "${strategy.title}"`;
  }
}

/**
 * Strips edition suffixes (longest first, repeatedly) and then one leading article.
 */
export function cleanTitle(title: string, vocabulary: TitleCleaningVocabulary): string {
  let result = title.replace(/\s+/g, ' ').trim();
  const suffixes = [...vocabulary.editionSuffixes].sort((a, b) => b.length - a.length);

  let stripped = true;
  while (stripped) {
    stripped = false;
    const lower = result.toLowerCase();
    for (const suffix of suffixes) {
      const needle = suffix.toLowerCase();
      if (!lower.endsWith(needle) || result.length <= needle.length) continue;
      const before = result[result.length - needle.length - 1];
      if (needle.startsWith('(') || before === ' ') {
        result = result.slice(0, result.length - needle.length).trim();
        stripped = true;
        break;
      }
    }
  }

  for (const article of vocabulary.leadingArticles) {
    const prefix = `${article.toLowerCase()} `;
    if (result.toLowerCase().startsWith(prefix) && result.length > prefix.length) {
      result = result.slice(prefix.length).trim();
      break;
    }
  }

  return result;
}

/**
 * "The " added or removed, then a trailing numeric sequel suffix dropped.
 */
export function titleVariations(title: string): string[] {
  const base = title.replace(/\s+/g, ' ').trim();
  const variants: string[] = [];

  if (/^the\s+/i.test(base)) {
    variants.push(base.replace(/^the\s+/i, ''));
  } else {
    variants.push(`The ${base}`);
  }

  const withoutSequel = base.replace(/\s+\d+$/, '');
  if (withoutSequel && withoutSequel !== base) {
    variants.push(withoutSequel);
  }

  return [...new Set(variants)].filter(Boolean);
}

export class ResolutionEngine {
  private readonly vocabulary: TitleCleaningVocabulary;
  private readonly coalesceRequests: boolean;
  private readonly fetchDetails: boolean;
  private readonly matcher: TitleMatcherService;
  private inFlight: Map<string, Promise<ResolutionOutcome>> = new Map();

  constructor(
    private readonly provider: MetadataProvider,
    private readonly cache: ResolutionCache,
    options: ResolutionEngineOptions
  ) {
    this.vocabulary = options.vocabulary;
    this.coalesceRequests = options.coalesceRequests ?? false;
    this.fetchDetails = options.fetchDetails ?? false;
    this.matcher = options.matcher ?? new TitleMatcherService();
  }

  async resolve(query: ResolutionQuery): Promise<ResolutionOutcome> {
    if (!this.coalesceRequests) {
      return this.runStrategies(query);
    }

    const key = ResolutionCache.queryKey(query);
    const pending = this.inFlight.get(key);
    if (pending) {
      console.log(`🔍 Joining in-flight lookup: ${key}`);
      return pending;
    }

    const lookup = this.runStrategies(query).finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, lookup);
    return lookup;
  }

  /** Ordered attempts for a query; queries identical to an earlier attempt are skipped */
  planAttempts(query: ResolutionQuery): Attempt[] {
    const attempts: Attempt[] = [];
    const seen = new Set<string>();

    const add = (strategy: ResolutionStrategy, attemptQuery: ResolutionQuery) => {
      const title = attemptQuery.title.trim();
      if (!title) return;
      const key = `${normalizeQueryTitle(title)}:${attemptQuery.year ?? 0}`;
      if (seen.has(key)) return;
      seen.add(key);
      attempts.push({ strategy, query: { title, year: attemptQuery.year } });
    };

    add({ kind: 'exact' }, query);
    add({ kind: 'no-year' }, { title: query.title });

    const cleaned = cleanTitle(query.title, this.vocabulary);
    add({ kind: 'cleaned-title', title: cleaned }, { title: cleaned, year: query.year });

    for (const variant of titleVariations(query.title)) {
      add({ kind: 'variation', title: variant }, { title: variant, year: query.year });
    }

    return attempts;
  }

  private async runStrategies(query: ResolutionQuery): Promise<ResolutionOutcome> {
    const cached = this.cache.getResolution(query);
    if (cached) {
      return this.fromCache(cached);
    }

    console.log(`🔍 Resolving "${query.title}"${query.year ? ` (${query.year})` : ''}`);
    let providerFailed = false;

    for (const attempt of this.planAttempts(query)) {
      console.log(`  🔍 Strategy: ${describeStrategy(attempt.strategy)}`);

      let ranked: ScoredCandidate[];
      try {
        const candidates = await this.provider.search(attempt.query.title, attempt.query.year);
        ranked = this.matcher.rankCandidates(attempt.query, candidates, attempt.strategy);
      } catch (error) {
        providerFailed = true;
        console.warn(`  ✗ Provider error, trying next strategy: ${describeError(error)}`);
        continue;
      }

      const best = this.matcher.findBestMatch(ranked);
      if (!best) continue;

      const match = this.fetchDetails ? await this.refresh(best) : best;
      const candidates = [match, ...ranked.slice(1, CACHED_CANDIDATES)];
      console.log(`  ✓ Found via ${describeStrategy(attempt.strategy)}: "${match.title}" (score ${match.matchScore.toFixed(1)})`);

      this.cache.putResolution(query, { strategy: attempt.strategy, candidates });
      return { status: 'matched', match, strategy: attempt.strategy, candidates, fromCache: false };
    }

    console.log(`  ✗ No match found after all strategies`);
    // A lookup cut short by provider errors may succeed later, so only clean misses are cached
    if (!providerFailed) {
      this.cache.putResolution(query, { strategy: null, candidates: [] });
    }
    return { status: 'no-match', fromCache: false, providerFailed };
  }

  private fromCache(cached: CachedResolution): ResolutionOutcome {
    const [match] = cached.candidates;
    if (cached.strategy && match) {
      return {
        status: 'matched',
        match,
        strategy: cached.strategy,
        candidates: cached.candidates,
        fromCache: true,
      };
    }
    return { status: 'no-match', fromCache: true, providerFailed: false };
  }

  private async refresh(candidate: ScoredCandidate): Promise<ScoredCandidate> {
    try {
      const details = await this.provider.getById(candidate.providerId);
      return { ...details, matchScore: candidate.matchScore, matchType: candidate.matchType };
    } catch (error) {
      console.warn(`  ✗ Could not refresh candidate ${candidate.providerId}: ${describeError(error)}`);
      return candidate;
    }
  }
}
