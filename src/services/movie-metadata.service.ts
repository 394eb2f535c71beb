import { LocalParse, ParseResult, ParsingMethod } from '../types/metadata.types';
import { ResolutionStrategy } from '../types/provider.types';
import { describeError, InputError } from '../utils/errors.util';
import { MovieNameParser } from '../utils/movie-name-parser.util';
import { mapWithConcurrency } from '../utils/worker-pool.util';
import { MetadataMergerService } from './metadata-merger.service';
import { ResolutionCache } from './resolution-cache.service';
import { ResolutionEngine } from './resolution-engine.service';

export interface MovieMetadataServiceOptions {
  /** Absent engine or false: local parsing only */
  engine?: ResolutionEngine;
  merger?: MetadataMergerService;
  cache?: ResolutionCache;
  enableExternalResolution?: boolean;
  concurrency?: number;
}

export type BatchItem =
  | { filename: string; status: 'ok'; result: ParseResult }
  | { filename: string; status: 'error'; error: string };

export function parsingMethodFor(strategy: ResolutionStrategy): ParsingMethod {
  switch (strategy.kind) {
    case 'exact':
      return 'provider:exact';
    case 'no-year':
      return 'provider:no-year';
    case 'cleaned-title':
      return 'provider:cleaned-title';
    case 'variation':
      return 'provider:variation';
  }
}

export class MovieMetadataService {
  private readonly parser: MovieNameParser;
  private readonly engine?: ResolutionEngine;
  private readonly merger: MetadataMergerService;
  private readonly cache?: ResolutionCache;
  private readonly concurrency: number;

  constructor(parser: MovieNameParser, options: MovieMetadataServiceOptions = {}) {
    this.parser = parser;
    this.engine = options.enableExternalResolution === false ? undefined : options.engine;
    this.merger = options.merger ?? new MetadataMergerService({ titleStrategy: parser.titleStrategy });
    this.cache = options.cache;
    this.concurrency = options.concurrency ?? 4;
  }

  get resolutionEnabled(): boolean {
    return this.engine !== undefined;
  }

  /**
   * Local parse only: no cache, no network. Throws InputError for unusable filenames.
   */
  parseLocal(filename: string): ParseResult {
    return this.toResult(this.parser.parse(filename), 'local');
  }

  async process(filename: string): Promise<ParseResult> {
    const cached = this.cache?.getParsed(filename);
    if (cached) {
      return { ...cached, parsingMethod: 'cache' };
    }

    const local = this.parser.parse(filename);
    if (!this.engine) {
      return this.toResult(local, 'local');
    }

    const outcome = await this.engine.resolve({
      title: this.parser.searchTitle(local),
      year: local.metadata.year,
    });

    let result: ParseResult;
    if (outcome.status === 'matched') {
      result = {
        ...this.toResult(local, parsingMethodFor(outcome.strategy)),
        metadata: this.merger.merge(local, outcome.match),
        providerId: outcome.match.providerId,
      };
    } else {
      const method = outcome.providerFailed ? 'local:provider-error' : 'local:no-match';
      result = this.toResult(local, method);
      result.warnings.push(
        outcome.providerFailed ? 'External resolution failed; using local parse' : 'No external match'
      );
    }

    if (result.parsingMethod !== 'local:provider-error') {
      this.cache?.putParsed(filename, result);
    }
    return result;
  }

  /**
   * Resolves filenames with bounded concurrency. Results are in input order; one failing
   * filename never aborts the batch.
   */
  async processBatch(filenames: readonly string[], concurrency: number = this.concurrency): Promise<BatchItem[]> {
    console.log(`\n=== Resolving ${filenames.length} filename(s), concurrency ${concurrency} ===`);

    const items = await mapWithConcurrency(filenames, concurrency, async (filename): Promise<BatchItem> => {
      try {
        return { filename, status: 'ok', result: await this.process(filename) };
      } catch (error) {
        if (!(error instanceof InputError)) {
          console.error(`✗ Unexpected failure for "${filename}":`, error);
        }
        return { filename, status: 'error', error: describeError(error) };
      }
    });

    const failed = items.filter((item) => item.status === 'error').length;
    console.log(`=== Done: ${items.length - failed} parsed, ${failed} failed ===\n`);
    return items;
  }

  private toResult(local: LocalParse, parsingMethod: ParsingMethod): ParseResult {
    const result: ParseResult = {
      metadata: local.metadata,
      parsingMethod,
      warnings: [...local.warnings],
    };
    if (local.series) {
      result.series = local.series;
    }
    return result;
  }
}
