export type ScoringProfile = 'local' | 'provider-merge';

export interface ConfidenceSignals {
  hasYear: boolean;
  hasQuality: boolean;
  hasSource: boolean;
  /** Words in the assembled display title */
  titleWordCount: number;
  /** Code points in the display title */
  titleLength: number;
  tokenCount: number;
}

interface ProfileWeights {
  base: number;
  year: number;
  quality: number;
  source: number;
  titleWords?: { weight: number; min: number; max: number };
  titleLength?: { weight: number; over: number };
  tokens?: { weight: number; min: number; max: number };
}

// Downstream thresholds depend on these exact constants
const PROFILES: Record<ScoringProfile, ProfileWeights> = {
  local: {
    base: 0.2,
    year: 0.3,
    quality: 0.2,
    source: 0.2,
    titleWords: { weight: 0.1, min: 2, max: 10 },
  },
  'provider-merge': {
    base: 0.5,
    year: 0.2,
    quality: 0,
    source: 0,
    titleLength: { weight: 0.2, over: 5 },
    tokens: { weight: 0.1, min: 3, max: 15 },
  },
};

function within(value: number, range: { min: number; max: number }): boolean {
  return value >= range.min && value <= range.max;
}

export function scoreConfidence(profile: ScoringProfile, signals: ConfidenceSignals): number {
  const weights = PROFILES[profile];
  let score = weights.base;

  if (signals.hasYear) score += weights.year;
  if (signals.hasQuality) score += weights.quality;
  if (signals.hasSource) score += weights.source;
  if (weights.titleWords && within(signals.titleWordCount, weights.titleWords)) {
    score += weights.titleWords.weight;
  }
  if (weights.titleLength && signals.titleLength > weights.titleLength.over) {
    score += weights.titleLength.weight;
  }
  if (weights.tokens && within(signals.tokenCount, weights.tokens)) {
    score += weights.tokens.weight;
  }

  // Rounded to hundredths so 0.2 + 0.3 + 0.2 + 0.2 + 0.1 is exactly 1
  const rounded = Math.round(score * 100) / 100;
  return Math.min(1, Math.max(0, rounded));
}

export function countWords(title: string): number {
  return title.split(/\s+/).filter(Boolean).length;
}

export function countCodePoints(text: string): number {
  return [...text].length;
}

export function isHighConfidence(confidence: number, threshold = 0.7): boolean {
  return confidence >= threshold;
}
