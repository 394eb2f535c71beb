import { loadVocabulary, TechnicalVocabulary } from '../config/vocabulary.config';
import { TitleStrategy } from '../types/metadata.types';
import { classify } from '../utils/script-classifier.util';
import { TechnicalExtractor } from '../utils/technical-extractor.util';
import { DEFAULT_TITLE_STRATEGY, formatTitle, TitleAssembler } from '../utils/title-assembler.util';
import { Tokenizer } from '../utils/tokenizer.util';

const vocabulary = loadVocabulary();

function assemble(filename: string, vocab: TechnicalVocabulary = vocabulary, strategy = DEFAULT_TITLE_STRATEGY) {
  const tokens = new Tokenizer(vocab.protectedMarkers).tokenize(filename);
  const technical = new TechnicalExtractor(vocab).extract(tokens);
  const profiles = tokens.map((token) => classify(token.text));
  return { tokens, assembly: new TitleAssembler(vocab).assemble(tokens, technical, profiles, strategy) };
}

describe('formatTitle', () => {
  const parts = { original: '钢铁侠', latin: 'Iron Man' };

  test('should put the original first with the Latin title in brackets by default', () => {
    expect(formatTitle(parts, DEFAULT_TITLE_STRATEGY)).toBe('钢铁侠 [Iron Man]');
  });

  test('should return whichever part is present', () => {
    expect(formatTitle({ original: '', latin: 'Heat' }, DEFAULT_TITLE_STRATEGY)).toBe('Heat');
    expect(formatTitle({ original: '英雄', latin: '  ' }, DEFAULT_TITLE_STRATEGY)).toBe('英雄');
  });

  test('should join separate Han and Kana fragments without brackets', () => {
    expect(
      formatTitle(
        { original: '千与千寻 千と千尋の神隠し', latin: 'Spirited Away', han: '千与千寻', kana: '千と千尋の神隠し' },
        DEFAULT_TITLE_STRATEGY
      )
    ).toBe('千与千寻 千と千尋の神隠し Spirited Away');
  });

  test('should bracket both parts when preserving brackets from the source', () => {
    const strategy: TitleStrategy = { preferOriginal: true, includeSubtitle: true, preserveBrackets: true };
    expect(formatTitle(parts, strategy, true)).toBe('[钢铁侠] [Iron Man]');
    expect(formatTitle(parts, strategy, false)).toBe('钢铁侠 [Iron Man]');
  });

  test.each([
    [{ preferOriginal: true, includeSubtitle: false, preserveBrackets: false }, '钢铁侠'],
    [{ preferOriginal: false, includeSubtitle: true, preserveBrackets: false }, 'Iron Man [钢铁侠]'],
    [{ preferOriginal: false, includeSubtitle: false, preserveBrackets: false }, 'Iron Man'],
  ])('should honour strategy %o', (strategy, expected) => {
    expect(formatTitle(parts, strategy)).toBe(expected);
  });
});

describe('TitleAssembler', () => {
  test('should bucket a bilingual release name', () => {
    const { assembly } = assemble('钢铁侠.Iron.Man.2008.BluRay.2160p.x265.10bit.HDR.4Audio.mUHD-FRDS.mkv');
    expect(assembly.displayTitle).toBe('钢铁侠 [Iron Man]');
    expect(assembly.originalTitle).toBe('钢铁侠');
    expect(assembly.buckets).toEqual({ japanese: '', chinese: '钢铁侠', otherScript: '', latin: 'Iron Man' });
    expect(assembly.titleTokens).toEqual([0, 1, 2]);
  });

  test('should give every token exactly one fate', () => {
    const { tokens, assembly } = assemble('钢铁侠.Iron.Man.2008.BluRay.2160p.x265.10bit.HDR.4Audio.mUHD-FRDS.mkv');
    expect([...assembly.discarded.entries()]).toEqual([
      [7, 'technical'],
      [8, 'technical'],
      [9, 'technical'],
      [11, 'technical'],
    ]);
    const technical = new TechnicalExtractor(vocabulary).extract(tokens);
    const fates = tokens.map(
      (_token, index) =>
        Number(technical.claimed.has(index)) +
        Number(assembly.discarded.has(index)) +
        Number(assembly.titleTokens.includes(index))
    );
    expect(fates.every((count) => count === 1)).toBe(true);
  });

  test('should drop sequel numbers but keep common words', () => {
    const { assembly } = assemble('The.Toy.Story.3.2010.1080p.BluRay.x264.mkv');
    expect(assembly.displayTitle).toBe('The Toy Story');
    expect(assembly.discarded.get(3)).toBe('numeric');
  });

  test('should drop language codes', () => {
    const { assembly } = assemble('Brat.1997.RUS.DVDRip.avi');
    expect(assembly.displayTitle).toBe('Brat');
    expect(assembly.discarded.get(2)).toBe('language-code');
  });

  test('should drop CJK noise phrases', () => {
    const { assembly } = assemble('钢铁侠.国英双语.Iron.Man.2008.mkv');
    expect(assembly.displayTitle).toBe('钢铁侠 [Iron Man]');
    expect(assembly.discarded.get(1)).toBe('cjk-noise');
  });

  test('should drop bracketed groups made only of technical parts', () => {
    const { assembly } = assemble('Heat.1995.[CHS&CHT&ENG].mkv');
    expect(assembly.displayTitle).toBe('Heat');
    expect(assembly.discarded.get(0)).toBe('technical');
  });

  test('should keep a vocabulary word that opens the title', () => {
    const { assembly } = assemble('Amazon.Women.on.the.Moon.1987.DVDRip.avi');
    expect(assembly.displayTitle).toBe('Amazon Women on the Moon');
    expect(assembly.titleTokens).toEqual([0, 1, 2, 3, 4]);
    expect(assembly.discarded.size).toBe(0);
  });

  test('should treat case-sensitive markers as noise only in their exact spelling', () => {
    const assembler = new TitleAssembler(vocabulary);
    expect(assembler.discardReason('Ma', classify('Ma'))).toBeUndefined();
    expect(assembler.discardReason('MA', classify('MA'))).toBe('technical');
    expect(assembler.discardReason('hevc', classify('hevc'))).toBe('technical');
  });

  test('should keep known titles even when they look like noise', () => {
    const noisy: TechnicalVocabulary = { ...vocabulary, noiseTerms: [...vocabulary.noiseTerms, 'Dunk'] };
    expect(assemble('Slam.Dunk.1993.mkv', noisy).assembly.displayTitle).toBe('Slam Dunk');

    const withoutAllowList: TechnicalVocabulary = { ...noisy, knownTitles: [] };
    expect(assemble('Slam.Dunk.1993.mkv', withoutAllowList).assembly.displayTitle).toBe('Slam');
  });

  test('should split Japanese from Chinese fragments', () => {
    const { assembly } = assemble('千与千寻.千と千尋の神隠し.Spirited.Away.2001.mkv');
    expect(assembly.buckets.chinese).toBe('千与千寻');
    expect(assembly.buckets.japanese).toBe('千と千尋の神隠し');
    expect(assembly.originalTitle).toBe('千与千寻 千と千尋の神隠し');
    expect(assembly.displayTitle).toBe('千与千寻 千と千尋の神隠し Spirited Away');
  });

  test('should put non-CJK scripts in their own bucket', () => {
    const { assembly } = assemble('Брат.1997.DVDRip.avi');
    expect(assembly.buckets.otherScript).toBe('Брат');
    expect(assembly.buckets.latin).toBe('');
    expect(assembly.displayTitle).toBe('Брат');
  });
});
