import { compareTwoStrings } from 'string-similarity';
import { MATCH_SCORING } from '../config/constants';
import {
  ExternalCandidate,
  MatchType,
  ResolutionQuery,
  ResolutionStrategy,
  ScoredCandidate,
} from '../types/provider.types';

export function releaseYear(candidate: ExternalCandidate): number | undefined {
  const match = candidate.releaseDate?.match(/^(\d{4})/);
  return match ? parseInt(match[1], 10) : undefined;
}

/**
 * Scores provider candidates against a query title/year.
 *
 * exact title (case-insensitive) +200, otherwise similarity x 150 plus 30 for containment;
 * year +100 exact, +50 within one, +25 within three; popularity capped at 30; rating x 2.
 */
export class TitleMatcherService {
  /**
   * Case-insensitive exact match
   */
  isExactMatch(title1: string, title2: string): boolean {
    return this.normalize(title1) === this.normalize(title2);
  }

  /**
   * Dice coefficient over character bigrams, 0..1
   */
  similarity(title1: string, title2: string): number {
    return compareTwoStrings(this.normalize(title1), this.normalize(title2));
  }

  isContainment(title1: string, title2: string): boolean {
    const n1 = this.normalize(title1);
    const n2 = this.normalize(title2);
    if (!n1 || !n2) return false;
    return n1.includes(n2) || n2.includes(n1);
  }

  scoreCandidate(query: ResolutionQuery, candidate: ExternalCandidate, strategy: ResolutionStrategy): ScoredCandidate {
    const titles = [candidate.title, candidate.originalTitle].filter((title): title is string => !!title);
    const exact = titles.some((title) => this.isExactMatch(query.title, title));

    let score = 0;
    if (exact) {
      score += MATCH_SCORING.EXACT_TITLE;
    } else {
      score += Math.max(0, ...titles.map((title) => this.similarity(query.title, title))) * MATCH_SCORING.SIMILARITY_SCALE;
      if (titles.some((title) => this.isContainment(query.title, title))) {
        score += MATCH_SCORING.CONTAINMENT;
      }
    }

    const year = releaseYear(candidate);
    if (query.year !== undefined && year !== undefined) {
      const diff = Math.abs(year - query.year);
      if (diff === 0) score += MATCH_SCORING.YEAR_EXACT;
      else if (diff <= 1) score += MATCH_SCORING.YEAR_WITHIN_ONE;
      else if (diff <= 3) score += MATCH_SCORING.YEAR_WITHIN_THREE;
    }

    score += Math.min(candidate.popularity, MATCH_SCORING.POPULARITY_CAP);
    score += candidate.voteAverage * MATCH_SCORING.RATING_MULTIPLIER;

    return {
      ...candidate,
      matchScore: score,
      matchType: this.matchType(exact, query, year, strategy),
    };
  }

  rankCandidates(
    query: ResolutionQuery,
    candidates: readonly ExternalCandidate[],
    strategy: ResolutionStrategy
  ): ScoredCandidate[] {
    return candidates
      .map((candidate) => this.scoreCandidate(query, candidate, strategy))
      .sort((a, b) => b.matchScore - a.matchScore);
  }

  /**
   * Top candidate when it clears the acceptance threshold, otherwise null
   */
  findBestMatch(ranked: readonly ScoredCandidate[]): ScoredCandidate | null {
    if (ranked.length === 0) return null;

    console.log(`  Top candidates:`);
    ranked.slice(0, 3).forEach((candidate, i) => {
      console.log(
        `    ${i + 1}. "${candidate.title}" (${releaseYear(candidate) ?? '?'}) - score: ${candidate.matchScore.toFixed(1)}`
      );
    });

    const best = ranked[0];
    return best.matchScore >= MATCH_SCORING.ACCEPT_THRESHOLD ? best : null;
  }

  /**
   * Lowercase, trimmed, single-spaced. Script-neutral so CJK titles compare as written.
   */
  normalize(title: string): string {
    return title.toLowerCase().replace(/\s+/g, ' ').trim();
  }

  private matchType(
    exact: boolean,
    query: ResolutionQuery,
    year: number | undefined,
    strategy: ResolutionStrategy
  ): MatchType {
    if (strategy.kind === 'cleaned-title' || strategy.kind === 'variation') return 'title-variation';
    if (!exact) return 'fuzzy';
    if (query.year !== undefined && year !== undefined && year !== query.year) return 'year-adjusted';
    return 'exact';
  }
}
