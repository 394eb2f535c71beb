export const MATCH_SCORING = {
  EXACT_TITLE: 200,
  SIMILARITY_SCALE: 100 * 1.5,
  CONTAINMENT: 30,
  YEAR_EXACT: 100,
  YEAR_WITHIN_ONE: 50,
  YEAR_WITHIN_THREE: 25,
  POPULARITY_CAP: 30,
  RATING_MULTIPLIER: 2,
  ACCEPT_THRESHOLD: 50,
} as const;

/** Provider original languages whose original title is preferred over the Latin one */
export const CJK_LANGUAGES: readonly string[] = ['ja', 'zh', 'ko'];

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export const CACHE_KEY_PREFIX = {
  RESOLUTION: 'tmdb:',
  PARSE: 'parse:',
} as const;

export const TMDB_DEFAULTS = {
  BASE_URL: 'https://api.themoviedb.org/3',
  LANGUAGE: 'en-US',
  TIMEOUT_MS: 10000,
  REQUESTS_PER_SECOND: 10,
} as const;
