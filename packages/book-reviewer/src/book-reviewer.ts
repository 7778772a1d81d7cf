import type {
  BookSplitterSettingsInput,
  TitleMatcherFactory,
} from '@chapterwise/book-splitter';
import type { LoggerMethods } from '@chapterwise/logger';
import type {
  BookReview,
  ChapterReviewEntry,
  TokenUsageReport,
} from '@chapterwise/model';
import type { TextGenerator } from '@chapterwise/shared';

import { BookSplitter } from '@chapterwise/book-splitter';
import { LLMTokenUsageAggregator, createAbortError } from '@chapterwise/shared';

import {
  ChapterAnalyzer,
  ChapterQuestionAnswerer,
  nextScratchpad,
} from './analyzers';
import { CHAPTER_ANALYZER } from './config/constants';

/**
 * BookReviewer Options
 */
export interface BookReviewerOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Text generation capability shared by splitting, analysis and questions
   */
  textGenerator: TextGenerator;

  /**
   * Settings of the splitting pipeline
   */
  splitterSettings?: BookSplitterSettingsInput;

  titleMatcherFactory?: TitleMatcherFactory;

  /**
   * Attempts per chapter analysis while rate limited (default: 5)
   */
  maxAttempts?: number;

  /**
   * First backoff wait in milliseconds (default: 1000)
   */
  initialDelayMs?: number;

  /**
   * Characters of the previous analysis carried forward (default: 1000)
   */
  scratchpadLength?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Called after each chapter analysis, in document order
   */
  onChapterAnalyzed?: (
    entry: ChapterReviewEntry,
    index: number,
    total: number,
  ) => void;
}

/**
 * BookReviewer
 *
 * Splits a book into chapters and analyzes them one after another. Each
 * analysis sees the tail of the previous one as a scratchpad, so chapters
 * are never analyzed in parallel.
 */
export class BookReviewer {
  private readonly logger: LoggerMethods;
  private readonly scratchpadLength: number;
  private readonly abortSignal?: AbortSignal;
  private readonly onChapterAnalyzed?: BookReviewerOptions['onChapterAnalyzed'];
  private readonly usageAggregator = new LLMTokenUsageAggregator();
  private readonly splitter: BookSplitter;
  private readonly analyzer: ChapterAnalyzer;
  private readonly answerer: ChapterQuestionAnswerer;

  /**
   * @throws {ZodError} When splitter settings are out of range
   */
  constructor(options: BookReviewerOptions) {
    this.logger = options.logger;
    this.scratchpadLength =
      options.scratchpadLength ?? CHAPTER_ANALYZER.SCRATCHPAD_LENGTH;
    this.abortSignal = options.abortSignal;
    this.onChapterAnalyzed = options.onChapterAnalyzed;

    this.splitter = new BookSplitter({
      logger: this.logger,
      textGenerator: options.textGenerator,
      settings: options.splitterSettings,
      titleMatcherFactory: options.titleMatcherFactory,
      abortSignal: this.abortSignal,
      usageAggregator: this.usageAggregator,
    });
    this.analyzer = new ChapterAnalyzer(
      this.logger,
      options.textGenerator,
      {
        maxAttempts: options.maxAttempts,
        initialDelayMs: options.initialDelayMs,
        abortSignal: this.abortSignal,
      },
      this.usageAggregator,
    );
    this.answerer = new ChapterQuestionAnswerer(
      this.logger,
      options.textGenerator,
      { abortSignal: this.abortSignal },
      this.usageAggregator,
    );
  }

  /**
   * Check if abort has been requested and throw error if so
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      throw createAbortError('Book review was aborted');
    }
  }

  /**
   * Split a book and analyze every chapter
   *
   * Chapter analyses that fail end up as placeholder text; splitting
   * failures are thrown.
   *
   * @throws {TocNotFoundError} When the book has no recognizable TOC
   * @throws {ChapterNotFoundError} When no chapter heading was found
   */
  async review(bookTitle: string, text: string): Promise<BookReview> {
    this.logger.info(`[BookReviewer] Starting review of "${bookTitle}"`);
    this.usageAggregator.reset();

    const { chapters } = await this.splitter.split(text);

    const entries: ChapterReviewEntry[] = [];
    let scratchpad = '';

    for (const [index, chapter] of chapters.entries()) {
      this.checkAborted();

      this.logger.info(
        `[BookReviewer] Analyzing chapter ${index + 1}/${chapters.length}: ${chapter.key}`,
      );

      const analysis = await this.analyzer.analyze({
        chapterKey: chapter.key,
        content: chapter.content,
        scratchpad,
      });
      scratchpad = nextScratchpad(analysis.text, this.scratchpadLength);

      const entry: ChapterReviewEntry = { chapter, analysis, questions: [] };
      entries.push(entry);
      this.onChapterAnalyzed?.(entry, index, chapters.length);
    }

    const failed = entries.filter(
      (entry) => entry.analysis.status !== 'completed',
    ).length;
    this.logger.info(
      `[BookReviewer] Review completed: ${entries.length} chapters, ${failed} without analysis`,
    );
    this.usageAggregator.logSummary(this.logger, '[BookReviewer]');

    return {
      bookTitle,
      chapters: entries,
      usage: this.usageAggregator.getReport(),
    };
  }

  /**
   * Ask a question about one reviewed chapter
   *
   * @returns A copy of the entry with the question and answer appended
   */
  async ask(
    entry: ChapterReviewEntry,
    question: string,
  ): Promise<ChapterReviewEntry> {
    const answer = await this.answerer.answer({
      question,
      chapterKey: entry.chapter.key,
      content: entry.chapter.content,
    });

    return { ...entry, questions: [...entry.questions, { question, answer }] };
  }

  /**
   * Token usage since the start of the latest review, questions included
   */
  getUsageReport(): TokenUsageReport {
    return this.usageAggregator.getReport();
  }
}
