import { Token } from '../types/metadata.types';

const SEPARATORS = new Set(['.', '_', '-', ' ']);
// Parentheses and braces never carry title text on their own
const DELIMITERS = new Set(['(', ')', '{', '}', '（', '）', '\t']);

const EXTENSION_PATTERN = /\.([A-Za-z0-9]{1,5})$/;

interface Span {
  start: number;
  end: number;
}

function isBoundary(text: string, index: number): boolean {
  if (index < 0 || index >= text.length) return true;
  const char = text[index];
  return SEPARATORS.has(char) || DELIMITERS.has(char);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Strips the final ".ext" suffix. Only short alphanumeric suffixes containing a letter count as
 * extensions, so "The.Matrix.1999" keeps its year.
 */
export function stripExtension(filename: string): string {
  const trimmed = filename.trim();
  const match = trimmed.match(EXTENSION_PATTERN);
  if (!match || !/[A-Za-z]/.test(match[1])) {
    return trimmed;
  }
  return trimmed.slice(0, trimmed.length - match[0].length);
}

export class Tokenizer {
  private readonly markerPatterns: RegExp[];

  /**
   * @param protectedMarkers technical markers with internal separators ("7.1", "WEB-DL", "10-bit")
   * that must survive splitting as a single token
   */
  constructor(protectedMarkers: readonly string[] = []) {
    this.markerPatterns = [...protectedMarkers]
      .sort((a, b) => b.length - a.length)
      .map((marker) => new RegExp(escapeRegExp(marker), 'gi'));
  }

  tokenize(filename: string): Token[] {
    const base = stripExtension(filename);
    if (!base) return [];

    const bracketTokens: Token[] = [];
    const masked = base.split('');

    // Bracketed runs become single tokens, emitted ahead of everything else
    let cursor = 0;
    while (cursor < base.length) {
      const open = base.indexOf('[', cursor);
      if (open === -1) break;
      const close = base.indexOf(']', open + 1);
      if (close === -1) break;

      const inner = base.slice(open + 1, close);
      const leading = inner.length - inner.trimStart().length;
      const text = inner.trim().replace(/\s+/g, ' ');
      if (text) {
        bracketTokens.push({ text, offset: open + 1 + leading, bracketed: true });
      }
      for (let i = open; i <= close; i++) masked[i] = ' ';
      cursor = close + 1;
    }

    const remainder = masked.join('');
    const protectedSpans = this.findProtectedSpans(remainder);

    return [...bracketTokens, ...this.split(remainder, protectedSpans)];
  }

  private findProtectedSpans(text: string): Span[] {
    const spans: Span[] = [];
    const overlaps = (start: number, end: number) =>
      spans.some((span) => start < span.end && end > span.start);

    for (const pattern of this.markerPatterns) {
      pattern.lastIndex = 0;
      let match: RegExpExecArray | null;
      while ((match = pattern.exec(text)) !== null) {
        const start = match.index;
        const end = start + match[0].length;
        if (isBoundary(text, start - 1) && isBoundary(text, end) && !overlaps(start, end)) {
          spans.push({ start, end });
        }
      }
    }

    return spans.sort((a, b) => a.start - b.start);
  }

  private split(text: string, protectedSpans: Span[]): Token[] {
    const tokens: Token[] = [];
    let current = '';
    let currentStart = -1;
    let spanIndex = 0;

    const flush = () => {
      if (current.trim()) {
        tokens.push({ text: current, offset: currentStart, bracketed: false });
      }
      current = '';
      currentStart = -1;
    };

    let i = 0;
    while (i < text.length) {
      const span = protectedSpans[spanIndex];
      if (span && span.start === i) {
        flush();
        tokens.push({ text: text.slice(span.start, span.end), offset: span.start, bracketed: false });
        i = span.end;
        spanIndex++;
        continue;
      }

      const char = text[i];
      if (SEPARATORS.has(char) || DELIMITERS.has(char) || /\s/.test(char)) {
        flush();
      } else {
        if (currentStart === -1) currentStart = i;
        current += char;
      }
      i++;
    }
    flush();

    return tokens;
  }
}
