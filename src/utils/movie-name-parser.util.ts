import { TechnicalVocabulary } from '../config/vocabulary.config';
import { LocalParse, ParsedMetadata, TitleStrategy } from '../types/metadata.types';
import { countCodePoints, countWords, scoreConfidence } from './confidence.util';
import { InputError } from './errors.util';
import { classify, hasNonLatinScript } from './script-classifier.util';
import { detectSeries } from './series-detector.util';
import { TechnicalExtractor } from './technical-extractor.util';
import { DEFAULT_TITLE_STRATEGY, TitleAssembler } from './title-assembler.util';
import { Tokenizer } from './tokenizer.util';

/**
 * Local, network-free filename parser: tokenize, extract technical attributes, classify scripts,
 * assemble the title and score it. Pure for a given vocabulary and strategy.
 */
export class MovieNameParser {
  private readonly tokenizer: Tokenizer;
  private readonly extractor: TechnicalExtractor;
  private readonly assembler: TitleAssembler;
  private readonly languageCodes: Set<string>;

  constructor(
    vocabulary: TechnicalVocabulary,
    private readonly strategy: TitleStrategy = DEFAULT_TITLE_STRATEGY
  ) {
    this.tokenizer = new Tokenizer(vocabulary.protectedMarkers);
    this.extractor = new TechnicalExtractor(vocabulary);
    this.assembler = new TitleAssembler(vocabulary);
    this.languageCodes = new Set(vocabulary.languageCodes.map((code) => code.toUpperCase()));
  }

  get titleStrategy(): TitleStrategy {
    return this.strategy;
  }

  parse(filename: string): LocalParse {
    if (!filename || !filename.trim()) {
      throw new InputError('Filename is empty', filename);
    }

    const tokens = this.tokenizer.tokenize(filename);
    if (tokens.length === 0) {
      throw new InputError(`No tokens in filename: "${filename}"`, filename);
    }

    const technical = this.extractor.extract(tokens);
    const profiles = tokens.map((token) => classify(token.text));
    const scriptProfile = classify(tokens.map((token) => token.text).join(' '));
    const assembly = this.assembler.assemble(tokens, technical, profiles, this.strategy);

    if (!assembly.displayTitle) {
      throw new InputError(`No usable title tokens in filename: "${filename}"`, filename);
    }

    const { components } = technical;
    const confidence = scoreConfidence('local', {
      hasYear: components.year !== undefined,
      hasQuality: components.quality !== undefined,
      hasSource: components.source !== undefined,
      titleWordCount: countWords(assembly.displayTitle),
      titleLength: countCodePoints(assembly.displayTitle),
      tokenCount: tokens.length,
    });

    const languageToken = tokens.find((token) => this.languageCodes.has(token.text.toUpperCase()));

    const metadata: ParsedMetadata = {
      title: assembly.displayTitle,
      originalTitle: assembly.originalTitle,
      year: components.year,
      quality: components.quality,
      source: components.source,
      language: languageToken ? languageToken.text.toUpperCase() : scriptProfile.primaryLanguage,
      audio: components.audio,
      codec: components.codec,
      releaseGroup: components.releaseGroup,
      confidence,
    };

    const warnings: string[] = [];
    if (components.year === undefined) {
      warnings.push('No release year found');
    } else if (![...technical.claimed.values()].includes('year')) {
      warnings.push(`Release year ${components.year} taken from the override table`);
    }
    if (!assembly.buckets.latin) {
      warnings.push('No Latin title fragment; external search will use the original-script title');
    }

    // Numeric tokens are dropped from the title but still mark instalments ("Toy Story 3")
    const seriesSource = tokens
      .filter(
        (token, index) =>
          (assembly.titleTokens.includes(index) || assembly.discarded.get(index) === 'numeric') &&
          !hasNonLatinScript(token.text)
      )
      .map((token) => token.text)
      .join(' ');

    return {
      metadata,
      tokens,
      technical,
      assembly,
      scriptProfile,
      series: seriesSource ? detectSeries(seriesSource) : undefined,
      warnings,
    };
  }

  /** Query title for the provider: the Latin fragment when there is one */
  searchTitle(parse: LocalParse): string {
    return parse.assembly.buckets.latin || parse.assembly.originalTitle || parse.metadata.title;
  }
}
