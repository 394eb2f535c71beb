export interface ExternalCandidate {
  providerId: number;
  title: string;
  originalTitle?: string;
  originalLanguage?: string;
  /** YYYY-MM-DD as reported by the provider, may be empty */
  releaseDate?: string;
  popularity: number;
  voteAverage: number;
  voteCount: number;
}

export type MatchType = 'exact' | 'fuzzy' | 'year-adjusted' | 'title-variation';

export interface ScoredCandidate extends ExternalCandidate {
  matchScore: number;
  matchType: MatchType;
}

export type ResolutionStrategy =
  | { kind: 'exact' }
  | { kind: 'no-year' }
  | { kind: 'cleaned-title'; title: string }
  | { kind: 'variation'; title: string };

export interface MetadataProvider {
  search(title: string, year?: number): Promise<ExternalCandidate[]>;
  getById(id: number): Promise<ExternalCandidate>;
}

export interface ResolutionQuery {
  title: string;
  year?: number;
}

export type ResolutionOutcome =
  | {
      status: 'matched';
      match: ScoredCandidate;
      strategy: ResolutionStrategy;
      candidates: ScoredCandidate[];
      fromCache: boolean;
    }
  | {
      status: 'no-match';
      fromCache: boolean;
      /** True when at least one strategy failed on a provider error rather than an empty result */
      providerFailed: boolean;
    };
