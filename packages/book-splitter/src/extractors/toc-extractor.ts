import type { LoggerMethods } from '@chapterwise/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
  TextGenerator,
} from '@chapterwise/shared';

import type { BookDocument } from '../utils/book-document';

import { BOOK_SPLITTER, NO_TOC_SENTINEL } from '../config/constants';
import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';
import { parseTocResponse } from './toc-response-parser';

/**
 * TocExtractor options
 */
export interface TocExtractorOptions extends BaseLLMComponentOptions {
  /**
   * Characters from the start of the book sent to the model (default: 2000)
   */
  tocPrefixLength?: number;

  /**
   * Longest response line accepted as a title (default: 200)
   */
  maxTitleLength?: number;
}

/**
 * Result of a TOC extraction
 */
export interface TocExtractionResult {
  /**
   * Candidate chapter titles in the order the TOC lists them
   */
  titles: string[];

  usage: ExtendedTokenUsage;
}

/**
 * TocExtractor
 *
 * Asks the text generator for the chapter names listed in the opening
 * characters of a book. The answer is a noisy hint: titles may be missing,
 * duplicated or not appear verbatim in the text.
 *
 * Generation errors are not retried here and propagate unchanged.
 */
export class TocExtractor extends TextLLMComponent {
  private readonly tocPrefixLength: number;
  private readonly maxTitleLength: number;

  constructor(
    logger: LoggerMethods,
    generator: TextGenerator,
    options?: TocExtractorOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, generator, 'TocExtractor', options, aggregator);
    this.tocPrefixLength =
      options?.tocPrefixLength ?? BOOK_SPLITTER.TOC_PREFIX_LENGTH;
    this.maxTitleLength =
      options?.maxTitleLength ?? BOOK_SPLITTER.MAX_TITLE_LENGTH;
  }

  /**
   * Extract candidate chapter titles from the start of the document
   *
   * @returns Titles (empty when the book has no recognizable TOC) and usage
   * @throws {RateLimitError} When the service asks to slow down
   * @throws {TextGenerationError} When the service fails otherwise
   */
  async extract(document: BookDocument): Promise<TocExtractionResult> {
    const prefix = document.prefix(this.tocPrefixLength);

    if (!prefix.trim()) {
      this.log('warn', 'Document start is empty, skipping TOC extraction');
      return { titles: [], usage: this.createEmptyUsage('extraction') };
    }

    this.log('info', `Starting TOC extraction (${prefix.length} chars)`);

    try {
      const result = await this.callTextLLM(
        this.buildSystemPrompt(),
        this.buildUserPrompt(prefix),
        'extraction',
      );

      const titles = parseTocResponse(result.output, {
        maxTitleLength: this.maxTitleLength,
      });

      this.log('info', `Extraction completed: ${titles.length} titles`);

      return { titles, usage: result.usage };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log('error', `Extraction failed: ${message}`);
      throw error;
    }
  }

  protected buildSystemPrompt(): string {
    return `You are a book structure assistant. Your task is to find the table of contents at the start of a book and list its chapter names.

## Instructions

1. Return ONLY the chapter names, one per line, in the order they appear in the table of contents.
2. Do not include chapter numbers, page numbers or bullets.
3. Do not add any introductory text such as "Here is the list of chapters".
4. Skip front and back matter entries that are not chapters (e.g., Dedication, Acknowledgements).
5. If the text contains no table of contents, answer with exactly: ${NO_TOC_SENTINEL}

## Example

Input:
CONTENTS
Dedication
Prologue: A New Beginning
1. The First Step
2. Challenges Ahead
3. Overcoming Obstacles
Epilogue: Looking Back
Acknowledgements

Output:
The First Step
Challenges Ahead
Overcoming Obstacles`;
  }

  protected buildUserPrompt(prefix: string): string {
    return `List the chapter names from the table of contents in the following text:

${prefix}`;
  }
}
