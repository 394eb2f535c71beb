import { CJK_LANGUAGES } from '../config/constants';
import { LocalParse, ParsedMetadata, TitleStrategy } from '../types/metadata.types';
import { ScoredCandidate } from '../types/provider.types';
import { countCodePoints, countWords, scoreConfidence } from '../utils/confidence.util';
import { hasNonLatinScript } from '../utils/script-classifier.util';
import { DEFAULT_TITLE_STRATEGY, formatTitle } from '../utils/title-assembler.util';
import { releaseYear } from './title-matcher.service';

export interface MergeOptions {
  titleStrategy?: TitleStrategy;
  /**
   * When the provider claims English as the original language but the filename carries a
   * non-Latin title, keep the filename's title as the original title.
   */
  preferFilenameOriginalTitle?: boolean;
}

export class MetadataMergerService {
  private readonly titleStrategy: TitleStrategy;
  private readonly preferFilenameOriginalTitle: boolean;

  constructor(options: MergeOptions = {}) {
    this.titleStrategy = options.titleStrategy ?? DEFAULT_TITLE_STRATEGY;
    this.preferFilenameOriginalTitle = options.preferFilenameOriginalTitle ?? true;
  }

  /**
   * Produces a new ParsedMetadata from the local parse and the accepted candidate. Quality, source,
   * audio, codec, release group and language always come from the local parse.
   */
  merge(local: LocalParse, match: ScoredCandidate): ParsedMetadata {
    const original = this.originalTitle(local, match);
    let latin = hasNonLatinScript(match.title) ? local.assembly.buckets.latin : match.title;
    if (original && latin && original.toLowerCase() === latin.toLowerCase()) {
      latin = '';
    }

    const sourceUsedBrackets = local.tokens.some((token) => token.bracketed);
    const title =
      formatTitle({ original: original ?? '', latin }, this.titleStrategy, sourceUsedBrackets) ||
      local.metadata.title;
    const year = releaseYear(match) ?? local.metadata.year;

    const confidence = scoreConfidence('provider-merge', {
      hasYear: year !== undefined,
      hasQuality: local.metadata.quality !== undefined,
      hasSource: local.metadata.source !== undefined,
      titleWordCount: countWords(title),
      titleLength: countCodePoints(title),
      tokenCount: local.tokens.length,
    });

    return {
      ...local.metadata,
      title,
      originalTitle: original,
      year,
      confidence,
    };
  }

  private originalTitle(local: LocalParse, match: ScoredCandidate): string | undefined {
    const language = match.originalLanguage?.toLowerCase();
    const providerOriginal = match.originalTitle?.trim();

    if (
      language &&
      CJK_LANGUAGES.includes(language) &&
      providerOriginal &&
      providerOriginal.toLowerCase() !== match.title.trim().toLowerCase()
    ) {
      return providerOriginal;
    }

    const providerNonLatin = [providerOriginal, match.title].find(
      (title): title is string => !!title && hasNonLatinScript(title)
    );
    const localOriginal = local.metadata.originalTitle;
    const acceptLocal = language !== 'en' || this.preferFilenameOriginalTitle;

    return providerNonLatin ?? (acceptLocal ? localOriginal : undefined);
  }
}
