import { TechnicalVocabulary } from '../config/vocabulary.config';
import {
  DiscardReason,
  ScriptProfile,
  TechnicalExtraction,
  TitleAssembly,
  TitleBuckets,
  TitleStrategy,
  Token,
} from '../types/metadata.types';
import { TermTable } from './term-table.util';

export const DEFAULT_TITLE_STRATEGY: TitleStrategy = {
  preferOriginal: true,
  includeSubtitle: true,
  preserveBrackets: false,
};

const COMPOSITE_SPLIT = /[._\-\s&+,/]+/;

export interface TitleParts {
  original: string;
  latin: string;
  /** Only set when a filename carried separate Han and Kana fragments */
  han?: string;
  kana?: string;
}

export function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Combines the original-script and Latin renderings according to the title strategy.
 * Either part may be empty, in which case the other is returned as is.
 */
export function formatTitle(parts: TitleParts, strategy: TitleStrategy, sourceUsedBrackets = false): string {
  const original = collapseSpaces(parts.original);
  const latin = collapseSpaces(parts.latin);

  if (!original) return latin;
  if (!latin) return original;

  if (strategy.preferOriginal && strategy.includeSubtitle) {
    if (parts.han && parts.kana) {
      return `${parts.han} ${parts.kana} ${latin}`;
    }
    if (strategy.preserveBrackets && sourceUsedBrackets) {
      return `[${original}] [${latin}]`;
    }
    return `${original} [${latin}]`;
  }
  if (strategy.preferOriginal) return original;
  if (strategy.includeSubtitle) return `${latin} [${original}]`;
  return latin;
}

export class TitleAssembler {
  private readonly technicalTerms: TermTable;
  private readonly languageCodes: Set<string>;
  private readonly commonWords: Set<string>;

  constructor(private readonly vocabulary: TechnicalVocabulary) {
    this.technicalTerms = new TermTable(
      [
        ...vocabulary.noiseTerms,
        ...vocabulary.quality,
        ...vocabulary.source,
        ...vocabulary.audio,
        ...vocabulary.codec,
        ...vocabulary.releaseGroups,
        ...vocabulary.protectedMarkers,
      ],
      new Set(vocabulary.caseSensitiveTerms)
    );
    this.languageCodes = new Set(vocabulary.languageCodes.map((code) => code.toUpperCase()));
    this.commonWords = new Set(vocabulary.commonWords.map((word) => word.toLowerCase()));
  }

  assemble(
    tokens: readonly Token[],
    technical: TechnicalExtraction,
    profiles: readonly ScriptProfile[],
    strategy: TitleStrategy
  ): TitleAssembly {
    const discarded = new Map<number, DiscardReason>();
    const titleTokens: number[] = [];
    const buckets: Record<keyof TitleBuckets, string[]> = {
      japanese: [],
      chinese: [],
      otherScript: [],
      latin: [],
    };

    tokens.forEach((token, index) => {
      if (technical.claimed.has(index)) return;

      const profile = profiles[index];
      const reason = technical.titleWords.has(index) ? undefined : this.discardReason(token.text, profile);
      if (reason) {
        discarded.set(index, reason);
        return;
      }

      titleTokens.push(index);
      buckets[this.bucketFor(profile)].push(token.text);
    });

    const joined: TitleBuckets = {
      japanese: collapseSpaces(buckets.japanese.join(' ')),
      chinese: collapseSpaces(buckets.chinese.join(' ')),
      otherScript: collapseSpaces(buckets.otherScript.join(' ')),
      latin: collapseSpaces(buckets.latin.join(' ')),
    };

    const original = collapseSpaces([joined.chinese, joined.japanese, joined.otherScript].join(' '));
    const sourceUsedBrackets = tokens.some((token) => token.bracketed);

    const displayTitle = formatTitle(
      { original, latin: joined.latin, han: joined.chinese, kana: joined.japanese },
      strategy,
      sourceUsedBrackets
    );

    return {
      displayTitle,
      originalTitle: original || undefined,
      buckets: joined,
      titleTokens,
      discarded,
    };
  }

  /** Returns why a token is noise, or undefined when it belongs in the title */
  discardReason(text: string, profile: ScriptProfile): DiscardReason | undefined {
    if (this.vocabulary.knownTitles.some((title) => text.includes(title))) return undefined;
    if (this.commonWords.has(text.toLowerCase())) return undefined;

    if (this.languageCodes.has(text.toUpperCase())) return 'language-code';
    if (/^\d+$/.test(text)) return 'numeric';
    if (this.technicalTerms.has(text) || text.includes('@')) return 'technical';

    if (
      profile.cjkCount * 2 > profile.charCount &&
      this.vocabulary.cjkNoisePhrases.some((phrase) => text.includes(phrase))
    ) {
      return 'cjk-noise';
    }

    if (this.isCompositeTechnical(text)) return 'technical';

    return undefined;
  }

  /** "BD-1080P", "CHS&CHT&ENG", "YTS.MX": every part is technical */
  private isCompositeTechnical(text: string): boolean {
    const parts = text.split(COMPOSITE_SPLIT).filter(Boolean);
    if (parts.length < 2) return false;
    return parts.every(
      (part) =>
        /^\d+$/.test(part) ||
        this.languageCodes.has(part.toUpperCase()) ||
        this.technicalTerms.has(part)
    );
  }

  private bucketFor(profile: ScriptProfile): keyof TitleBuckets {
    if (profile.scripts.has('kana')) return 'japanese';
    if (profile.scripts.has('han')) return 'chinese';
    const nonLatin = [...profile.scripts].some((script) => script !== 'latin');
    return nonLatin ? 'otherScript' : 'latin';
  }
}
