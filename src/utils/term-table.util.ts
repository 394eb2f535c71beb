/**
 * Vocabulary lookup keyed on lower case. Terms listed as case-sensitive ("iT", "MA", "NF") only
 * match their exact spelling, so "It" or "Ma" in a title are left alone.
 */
export class TermTable {
  private readonly labels = new Map<string, string>();

  constructor(terms: readonly string[], private readonly caseSensitive: ReadonlySet<string> = new Set()) {
    for (const term of terms) {
      const key = term.toLowerCase();
      // First spelling in the vocabulary is the canonical label
      if (!this.labels.has(key)) this.labels.set(key, term);
    }
  }

  /** Canonical label for `text`, or undefined when it is not a term */
  lookup(text: string): string | undefined {
    const label = this.labels.get(text.toLowerCase());
    if (label === undefined) return undefined;
    if (this.caseSensitive.has(label) && text !== label) return undefined;
    return label;
  }

  has(text: string): boolean {
    return this.lookup(text) !== undefined;
  }
}
