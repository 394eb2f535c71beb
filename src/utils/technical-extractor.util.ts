import { TechnicalVocabulary } from '../config/vocabulary.config';
import { TechnicalComponents, TechnicalExtraction, TechnicalField, Token } from '../types/metadata.types';
import { TermTable } from './term-table.util';

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2030;

type LabelField = Exclude<TechnicalField, 'year'>;

const LABEL_FIELDS: readonly LabelField[] = ['quality', 'source', 'audio', 'codec', 'releaseGroup'];

export function parseYear(text: string): number | undefined {
  if (!/^\d{4}$/.test(text)) return undefined;
  const year = parseInt(text, 10);
  return year >= MIN_YEAR && year <= MAX_YEAR ? year : undefined;
}

export class TechnicalExtractor {
  private readonly tables: Record<LabelField, TermTable>;
  private readonly noise: TermTable;
  private readonly markers: TermTable;

  constructor(private readonly vocabulary: TechnicalVocabulary) {
    const caseSensitive = new Set(vocabulary.caseSensitiveTerms);
    this.tables = {
      quality: new TermTable(vocabulary.quality, caseSensitive),
      source: new TermTable(vocabulary.source, caseSensitive),
      audio: new TermTable(vocabulary.audio, caseSensitive),
      codec: new TermTable(vocabulary.codec, caseSensitive),
      releaseGroup: new TermTable(vocabulary.releaseGroups, caseSensitive),
    };
    this.noise = new TermTable(vocabulary.noiseTerms, caseSensitive);
    this.markers = new TermTable(vocabulary.protectedMarkers, caseSensitive);
  }

  /**
   * Order matters: year, quality, source, audio, codec, release group. A token claimed by an
   * earlier category is invisible to the later ones. Plain words ahead of the year that happen
   * to be vocabulary terms ("Amazon") stay in the title.
   */
  extract(tokens: readonly Token[]): TechnicalExtraction {
    const claimed = new Map<number, TechnicalField>();
    const components: TechnicalComponents = {};

    const yearIndex = tokens.findIndex((token) => parseYear(token.text) !== undefined);
    if (yearIndex !== -1) {
      components.year = parseYear(tokens[yearIndex].text);
      claimed.set(yearIndex, 'year');
    } else {
      components.year = this.yearFromOverrides(tokens);
    }

    const titleWords = this.findTitleWords(tokens, yearIndex);
    const taken = (index: number) => claimed.has(index) || titleWords.has(index);

    components.quality = this.claimSingle(tokens, claimed, taken, 'quality');
    components.source =
      this.claimSingle(tokens, claimed, taken, 'source') ?? this.claimPair(tokens, claimed, taken, 'source');
    components.audio = this.claimSingle(tokens, claimed, taken, 'audio');
    components.codec = this.claimSingle(tokens, claimed, taken, 'codec');
    components.releaseGroup =
      this.claimSingle(tokens, claimed, taken, 'releaseGroup') ?? this.claimTrailingGroup(tokens, claimed, taken);

    return { components: this.compact(components), claimed, titleWords };
  }

  /** True when `text` is a category label, a noise term or a protected marker */
  private isKnownTerm(text: string): boolean {
    return this.isCategoryTerm(text) || this.noise.has(text) || this.markers.has(text);
  }

  private isCategoryTerm(text: string): boolean {
    return LABEL_FIELDS.some((field) => this.tables[field].has(text));
  }

  private findTitleWords(tokens: readonly Token[], yearIndex: number): Set<number> {
    const titleWords = new Set<number>();
    for (let i = 0; i < yearIndex; i++) {
      const token = tokens[i];
      if (token.bracketed || !/^\p{L}+$/u.test(token.text)) continue;
      if (this.isCategoryTerm(token.text) && !this.noise.has(token.text)) {
        titleWords.add(i);
      }
    }
    return titleWords;
  }

  private yearFromOverrides(tokens: readonly Token[]): number | undefined {
    const lowered = tokens.map((token) => token.text.toLowerCase());
    const override = this.vocabulary.yearOverrides.find((entry) =>
      entry.allOf.every((term) => lowered.some((text) => text.includes(term.toLowerCase())))
    );
    return override?.year;
  }

  private claimSingle(
    tokens: readonly Token[],
    claimed: Map<number, TechnicalField>,
    taken: (index: number) => boolean,
    field: LabelField
  ): string | undefined {
    const table = this.tables[field];
    for (let i = 0; i < tokens.length; i++) {
      if (taken(i)) continue;
      const label = table.lookup(tokens[i].text);
      if (label !== undefined) {
        claimed.set(i, field);
        return label;
      }
    }
    return undefined;
  }

  /** Catches hyphenated markers split apart by the tokenizer, e.g. "WEB.DL" */
  private claimPair(
    tokens: readonly Token[],
    claimed: Map<number, TechnicalField>,
    taken: (index: number) => boolean,
    field: LabelField
  ): string | undefined {
    const table = this.tables[field];
    for (let i = 0; i + 1 < tokens.length; i++) {
      if (taken(i) || taken(i + 1)) continue;
      const label = table.lookup(`${tokens[i].text}-${tokens[i + 1].text}`);
      if (label !== undefined) {
        claimed.set(i, field);
        claimed.set(i + 1, field);
        return label;
      }
    }
    return undefined;
  }

  /** An unknown last token carrying "@" or "-"; known markers such as "8-bit" never qualify */
  private claimTrailingGroup(
    tokens: readonly Token[],
    claimed: Map<number, TechnicalField>,
    taken: (index: number) => boolean
  ): string | undefined {
    const last = tokens.length - 1;
    if (last < 0 || taken(last)) return undefined;
    const text = tokens[last].text;
    if (this.isKnownTerm(text)) return undefined;
    if (text.includes('@') || text.includes('-')) {
      claimed.set(last, 'releaseGroup');
      return text;
    }
    return undefined;
  }

  private compact(components: TechnicalComponents): TechnicalComponents {
    const result: TechnicalComponents = {};
    if (components.year !== undefined) result.year = components.year;
    if (components.quality !== undefined) result.quality = components.quality;
    if (components.source !== undefined) result.source = components.source;
    if (components.audio !== undefined) result.audio = components.audio;
    if (components.codec !== undefined) result.codec = components.codec;
    if (components.releaseGroup !== undefined) result.releaseGroup = components.releaseGroup;
    return result;
  }
}
