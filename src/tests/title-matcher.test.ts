import { releaseYear, TitleMatcherService } from '../services/title-matcher.service';
import { candidate, HERO } from './helpers/fake-provider';

describe('TitleMatcherService', () => {
  const matcher = new TitleMatcherService();

  describe('Title comparison', () => {
    test('should match case-insensitively with collapsed spaces', () => {
      expect(matcher.isExactMatch('The  Matrix ', 'the matrix')).toBe(true);
      expect(matcher.isExactMatch('The Matrix', 'The Matrix Reloaded')).toBe(false);
    });

    test('should detect containment', () => {
      expect(matcher.isContainment('The Matrix', 'The Matrix Reloaded')).toBe(true);
      expect(matcher.isContainment('Heat', '')).toBe(false);
    });

    test('should read the release year from the date', () => {
      expect(releaseYear(HERO)).toBe(2002);
      expect(releaseYear(candidate({ providerId: 9, title: 'Untitled' }))).toBeUndefined();
    });
  });

  describe('Scoring', () => {
    test('should score an exact title and year', () => {
      const scored = matcher.scoreCandidate({ title: 'Hero', year: 2002 }, HERO, { kind: 'exact' });
      expect(scored.matchScore).toBe(327.5);
      expect(scored.matchType).toBe('exact');
    });

    test('should mark a nearby year as year-adjusted', () => {
      const scored = matcher.scoreCandidate({ title: 'Hero', year: 2003 }, HERO, { kind: 'exact' });
      expect(scored.matchScore).toBe(277.5);
      expect(scored.matchType).toBe('year-adjusted');
    });

    test('should give 25 for a year within three', () => {
      const scored = matcher.scoreCandidate({ title: 'Hero', year: 2005 }, HERO, { kind: 'exact' });
      expect(scored.matchScore).toBe(252.5);
    });

    test('should cap popularity', () => {
      const popular = candidate({ providerId: 2, title: 'Heat', popularity: 80 });
      expect(matcher.scoreCandidate({ title: 'Heat' }, popular, { kind: 'no-year' }).matchScore).toBe(230);
    });

    test('should score a fuzzy match by similarity plus containment', () => {
      const reloaded = candidate({ providerId: 3, title: 'The Matrix Reloaded' });
      const scored = matcher.scoreCandidate({ title: 'The Matrix' }, reloaded, { kind: 'exact' });
      expect(scored.matchScore).toBeCloseTo(130, 5);
      expect(scored.matchType).toBe('fuzzy');
    });

    test('should match against the original title', () => {
      const scored = matcher.scoreCandidate({ title: '英雄', year: 2002 }, HERO, { kind: 'exact' });
      expect(scored.matchScore).toBe(327.5);
    });

    test('should tag variation strategies', () => {
      const scored = matcher.scoreCandidate({ title: 'Hero', year: 2002 }, HERO, {
        kind: 'variation',
        title: 'Hero',
      });
      expect(scored.matchType).toBe('title-variation');
    });
  });

  describe('Best match', () => {
    test('should rank candidates by score', () => {
      const ranked = matcher.rankCandidates(
        { title: 'Hero', year: 2002 },
        [candidate({ providerId: 5, title: 'Hero Wanted', releaseDate: '2008-03-01' }), HERO],
        { kind: 'exact' }
      );
      expect(ranked.map((entry) => entry.providerId)).toEqual([1, 5]);
      expect(matcher.findBestMatch(ranked)?.providerId).toBe(1);
    });

    test('should reject candidates below the threshold', () => {
      const ranked = matcher.rankCandidates(
        { title: 'Hero' },
        [candidate({ providerId: 6, title: 'Zzzz Qqqq', popularity: 1 })],
        { kind: 'exact' }
      );
      expect(ranked[0].matchScore).toBe(1);
      expect(matcher.findBestMatch(ranked)).toBeNull();
    });

    test('should return null for no candidates', () => {
      expect(matcher.findBestMatch([])).toBeNull();
    });
  });
});
