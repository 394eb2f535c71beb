export interface Token {
  readonly text: string;
  /** UTF-16 offset of the token's first character in the extension-less filename */
  readonly offset: number;
  readonly bracketed: boolean;
}

export type Script =
  | 'latin'
  | 'han'
  | 'kana'
  | 'hangul'
  | 'arabic'
  | 'cyrillic'
  | 'devanagari'
  | 'thai'
  | 'hebrew'
  | 'greek';

export type PrimaryLanguage =
  | 'Japanese'
  | 'Chinese'
  | 'Korean'
  | 'Arabic'
  | 'Russian'
  | 'Hindi'
  | 'Thai'
  | 'Hebrew'
  | 'Greek'
  | 'English';

export interface ScriptProfile {
  scripts: ReadonlySet<Script>;
  primaryLanguage?: PrimaryLanguage;
  bilingual: boolean;
  trilingual: boolean;
  /** Han and Kana code points, used by the CJK noise filter */
  cjkCount: number;
  /** Number of non-whitespace code points */
  charCount: number;
}

export type TechnicalField = 'year' | 'quality' | 'source' | 'audio' | 'codec' | 'releaseGroup';

export interface TechnicalComponents {
  year?: number;
  quality?: string;
  source?: string;
  audio?: string;
  codec?: string;
  releaseGroup?: string;
}

export interface TechnicalExtraction {
  components: TechnicalComponents;
  /** Token index -> field that claimed it */
  claimed: ReadonlyMap<number, TechnicalField>;
  /** Word-like vocabulary terms ahead of the year, kept as title words ("Amazon Women on the Moon") */
  titleWords: ReadonlySet<number>;
}

export interface TitleStrategy {
  preferOriginal: boolean;
  includeSubtitle: boolean;
  /** Legacy formatter: "[original] [latin]" when the filename itself used brackets */
  preserveBrackets: boolean;
}

export type DiscardReason = 'language-code' | 'numeric' | 'technical' | 'cjk-noise';

export interface TitleBuckets {
  japanese: string;
  chinese: string;
  otherScript: string;
  latin: string;
}

export interface TitleAssembly {
  displayTitle: string;
  originalTitle?: string;
  buckets: TitleBuckets;
  /** Token indices that ended up in a title bucket, in filename order */
  titleTokens: number[];
  discarded: ReadonlyMap<number, DiscardReason>;
}

export interface ParsedMetadata {
  readonly title: string;
  readonly originalTitle?: string;
  readonly year?: number;
  readonly quality?: string;
  readonly source?: string;
  readonly language?: string;
  readonly audio?: string;
  readonly codec?: string;
  readonly releaseGroup?: string;
  readonly confidence: number;
}

export type ParsingMethod =
  | 'local'
  | 'cache'
  | 'provider:exact'
  | 'provider:no-year'
  | 'provider:cleaned-title'
  | 'provider:variation'
  | 'local:no-match'
  | 'local:provider-error';

export interface SeriesInfo {
  name: string;
  number: number;
}

export interface LocalParse {
  metadata: ParsedMetadata;
  tokens: Token[];
  technical: TechnicalExtraction;
  assembly: TitleAssembly;
  scriptProfile: ScriptProfile;
  series?: SeriesInfo;
  warnings: string[];
}

export interface ParseResult {
  metadata: ParsedMetadata;
  parsingMethod: ParsingMethod;
  warnings: string[];
  series?: SeriesInfo;
  providerId?: number;
}
