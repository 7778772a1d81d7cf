import type { LoggerMethods } from '@chapterwise/logger';
import type { BookSplitResult, TokenUsageReport } from '@chapterwise/model';
import type { TextGenerator } from '@chapterwise/shared';

import type { BookSplitterSettingsInput } from './config';
import type { TitleMatcherFactory } from './scanners';

import { LLMTokenUsageAggregator, createAbortError } from '@chapterwise/shared';

import { resolveBookSplitterSettings } from './config';
import { ChapterMaterializer } from './converters';
import { TocExtractor, TocNotFoundError } from './extractors';
import { ChapterNotFoundError, OccurrenceReconciler } from './reconcilers';
import { OccurrenceScanner } from './scanners';
import { BookDocument } from './utils/book-document';

/**
 * BookSplitter Options
 */
export interface BookSplitterOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Text generation capability used for TOC extraction
   */
  textGenerator: TextGenerator;

  /**
   * Pipeline heuristics; validated at construction
   */
  settings?: BookSplitterSettingsInput;

  /**
   * Heading predicate per title (default: anchored, numbered prefix match)
   */
  titleMatcherFactory?: TitleMatcherFactory;

  /**
   * Abort signal for cancellation support
   *
   * When aborted, splitting stops at the next checkpoint between stages.
   */
  abortSignal?: AbortSignal;

  /**
   * Called with the cumulative token usage after TOC extraction
   */
  onTokenUsage?: (report: TokenUsageReport) => void;

  /**
   * Aggregator shared with other components (optional)
   *
   * A shared aggregator is not reset between runs; its owner decides when a
   * run starts. Without one, the splitter keeps a private aggregator and
   * resets it at the start of every run.
   */
  usageAggregator?: LLMTokenUsageAggregator;
}

/**
 * BookSplitter
 *
 * Splits a plain-text book into chapter ranges.
 *
 * Pipeline:
 * 1. Extract candidate titles from the start of the book (one LLM call)
 * 2. Scan every line for headings of those titles
 * 3. Reconcile raw occurrences into one start per chapter
 * 4. Materialize ranges between consecutive starts
 *
 * The TOC is only a hint; the literal text decides where chapters begin.
 */
export class BookSplitter {
  private readonly logger: LoggerMethods;
  private readonly abortSignal?: AbortSignal;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;
  private readonly usageAggregator: LLMTokenUsageAggregator;
  private readonly ownsAggregator: boolean;
  private readonly tocExtractor: TocExtractor;
  private readonly scanner: OccurrenceScanner;
  private readonly reconciler: OccurrenceReconciler;
  private readonly materializer: ChapterMaterializer;

  /**
   * @throws {ZodError} When settings are out of range
   */
  constructor(options: BookSplitterOptions) {
    const settings = resolveBookSplitterSettings(options.settings);

    this.logger = options.logger;
    this.abortSignal = options.abortSignal;
    this.onTokenUsage = options.onTokenUsage;
    this.ownsAggregator = options.usageAggregator === undefined;
    this.usageAggregator =
      options.usageAggregator ?? new LLMTokenUsageAggregator();

    this.tocExtractor = new TocExtractor(
      this.logger,
      options.textGenerator,
      {
        tocPrefixLength: settings.tocPrefixLength,
        maxTitleLength: settings.maxTitleLength,
        abortSignal: this.abortSignal,
      },
      this.usageAggregator,
    );
    this.scanner = new OccurrenceScanner(this.logger, {
      titleMatcherFactory: options.titleMatcherFactory,
    });
    this.reconciler = new OccurrenceReconciler(this.logger, {
      mergeWindow: settings.mergeWindow,
      minChapterGap: settings.minChapterGap,
    });
    this.materializer = new ChapterMaterializer(this.logger);
  }

  /**
   * Emit current token usage report via callback
   */
  private emitTokenUsage(): void {
    this.onTokenUsage?.(this.usageAggregator.getReport());
  }

  /**
   * Check if abort has been requested and throw error if so
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      throw createAbortError('Book splitting was aborted');
    }
  }

  /**
   * Split a book into chapter ranges
   *
   * @param text - Whole book as plain text
   * @returns Every pipeline stage's output and the token usage report
   *
   * @throws {TocNotFoundError} When no chapter titles were extracted
   * @throws {ChapterNotFoundError} When no title occurs as a heading
   * @throws {TextGenerationError} When TOC extraction fails (RateLimitError when transient)
   */
  async split(text: string): Promise<BookSplitResult> {
    this.logger.info('[BookSplitter] Starting book splitting...');

    if (this.ownsAggregator) {
      this.usageAggregator.reset();
    }

    this.checkAborted();

    const document = new BookDocument(text);
    this.logger.info(
      `[BookSplitter] Document has ${document.lineCount} lines (${text.length} chars)`,
    );

    const startTimeToc = Date.now();
    const { titles } = await this.tocExtractor.extract(document);
    const tocTime = Date.now() - startTimeToc;
    this.logger.info(`[BookSplitter] TOC extraction took ${tocTime}ms`);
    this.emitTokenUsage();

    if (titles.length === 0) {
      this.logger.error('[BookSplitter] No table of contents found');
      throw new TocNotFoundError();
    }

    this.checkAborted();

    const startTimeScan = Date.now();
    const occurrences = this.scanner.scan(document, titles);
    const scanTime = Date.now() - startTimeScan;
    this.logger.info(`[BookSplitter] Occurrence scan took ${scanTime}ms`);

    if (occurrences.length === 0) {
      this.logger.error('[BookSplitter] No chapter title occurs in the text');
      throw new ChapterNotFoundError('scan');
    }

    this.checkAborted();

    const chapterStarts = this.reconciler.reconcile(occurrences);

    if (chapterStarts.length === 0) {
      throw new ChapterNotFoundError('reconcile');
    }

    const startTimeChapters = Date.now();
    const chapters = this.materializer.materialize(document, chapterStarts);
    const chaptersTime = Date.now() - startTimeChapters;
    this.logger.info(
      `[BookSplitter] Chapter materialization took ${chaptersTime}ms`,
    );

    this.logger.info(
      `[BookSplitter] Book splitting completed: ${chapters.length} chapters`,
    );

    return {
      titles,
      occurrences,
      chapterStarts,
      chapters,
      lineCount: document.lineCount,
      usage: this.usageAggregator.getReport(),
    };
  }
}
