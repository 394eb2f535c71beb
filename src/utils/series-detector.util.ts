import { SeriesInfo } from '../types/metadata.types';

const ROMAN_NUMERALS: Record<string, number> = {
  I: 1,
  II: 2,
  III: 3,
  IV: 4,
  V: 5,
  VI: 6,
  VII: 7,
  VIII: 8,
  IX: 9,
  X: 10,
};

// Checked in order; keyword forms win over a bare trailing number
const SERIES_PATTERNS: RegExp[] = [
  /^(.+?)\s+Part\s+(\d+)$/i,
  /^(.+?)\s+Chapter\s+(\d+)$/i,
  /^(.+?)\s+(?:Volume|Vol)\s+(\d+)$/i,
  /^(.+?)\s+Episode\s+(\d+)$/i,
  /^(.+?)\s+Season\s+(\d+)$/i,
  /^(.+?)\s+(\d+)$/,
];

const ROMAN_PATTERN = /^(.+?)\s+(I{1,3}|IV|V|VI{1,3}|IX|X)$/;

/**
 * Detects a numbered instalment ("Toy Story 3", "Dune Part 2", "Rocky IV").
 * A name that itself ends in a digit is rejected so "Iron Man 2 3" is not read as part 3.
 */
export function detectSeries(title: string): SeriesInfo | undefined {
  const text = title.replace(/\s+/g, ' ').trim();

  for (const pattern of SERIES_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const name = match[1].trim();
    const number = parseInt(match[2], 10);
    if (/\d$/.test(name) || number <= 0) return undefined;
    return { name, number };
  }

  const roman = text.match(ROMAN_PATTERN);
  if (roman) {
    const number = ROMAN_NUMERALS[roman[2]];
    if (number !== undefined) return { name: roman[1].trim(), number };
  }

  return undefined;
}
