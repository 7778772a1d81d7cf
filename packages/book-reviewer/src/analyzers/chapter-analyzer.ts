import type { LoggerMethods } from '@chapterwise/logger';
import type { ChapterAnalysis } from '@chapterwise/model';
import type {
  LLMTokenUsageAggregator,
  TextGenerator,
} from '@chapterwise/shared';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '@chapterwise/book-splitter';
import {
  RateLimitError,
  TextGenerationError,
  isAbortError,
  retryWithBackoff,
} from '@chapterwise/shared';

import { CHAPTER_ANALYZER } from '../config/constants';

/**
 * ChapterAnalyzer options
 */
export interface ChapterAnalyzerOptions extends BaseLLMComponentOptions {
  /**
   * Attempts per chapter while rate limited (default: 5)
   */
  maxAttempts?: number;

  /**
   * Wait before the second attempt in milliseconds (default: 1000)
   */
  initialDelayMs?: number;
}

export interface ChapterAnalysisInput {
  chapterKey: string;
  content: string;

  /**
   * Tail of the previous chapter's analysis ('' for the first chapter)
   */
  scratchpad: string;
}

/**
 * ChapterAnalyzer
 *
 * Writes a markdown study note per chapter: summary, Zettelkasten notes,
 * references, topic links, open questions and quotes.
 *
 * Rate limits are retried with exponential backoff. A chapter whose analysis
 * still fails gets placeholder text, so one chapter never ends a review.
 * Aborts are re-thrown.
 */
export class ChapterAnalyzer extends TextLLMComponent {
  private readonly maxAttempts: number;
  private readonly initialDelayMs: number;

  constructor(
    logger: LoggerMethods,
    generator: TextGenerator,
    options?: ChapterAnalyzerOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, generator, 'ChapterAnalyzer', options, aggregator);
    this.maxAttempts = options?.maxAttempts ?? CHAPTER_ANALYZER.MAX_ATTEMPTS;
    this.initialDelayMs =
      options?.initialDelayMs ?? CHAPTER_ANALYZER.INITIAL_DELAY_MS;
  }

  async analyze(input: ChapterAnalysisInput): Promise<ChapterAnalysis> {
    const { chapterKey } = input;
    this.log(
      'info',
      `Analyzing chapter ${chapterKey} (${input.content.length} chars)`,
    );

    try {
      const result = await retryWithBackoff(
        () =>
          this.callTextLLM(
            this.buildSystemPrompt(),
            this.buildUserPrompt(input),
            'analysis',
          ),
        {
          maxAttempts: this.maxAttempts,
          initialDelayMs: this.initialDelayMs,
          shouldRetry: (error) => error instanceof RateLimitError,
          onRetry: (_error, attempt, delayMs) =>
            this.log(
              'warn',
              `Rate limit reached. Waiting ${delayMs}ms before attempt ${attempt + 1}/${this.maxAttempts}`,
            ),
          abortSignal: this.abortSignal,
        },
      );

      return { chapterKey, text: result.output, status: 'completed' };
    } catch (error) {
      if (isAbortError(error) || this.abortSignal?.aborted) {
        throw error;
      }

      if (error instanceof RateLimitError) {
        this.log(
          'error',
          `Max attempts reached. Unable to analyze chapter: ${chapterKey}`,
        );
        return {
          chapterKey,
          text: `Error: Unable to analyze chapter due to rate limiting. Please try again later.\n\nChapter: ${chapterKey}`,
          status: 'rate-limited',
        };
      }

      const message = TextGenerationError.getErrorMessage(error);
      this.log(
        'error',
        `An error occurred while analyzing chapter ${chapterKey}: ${message}`,
      );
      return {
        chapterKey,
        text: `Error: An unexpected error occurred while analyzing the chapter.\n\nChapter: ${chapterKey}\nError: ${message}`,
        status: 'failed',
      };
    }
  }

  protected buildSystemPrompt(): string {
    return `You are a careful reader writing study notes for a book, one chapter at a time.

## Tasks

1. Write a comprehensive markdown summary of the chapter. Include key ideas, arguments, and significant examples or case studies.
2. List potential Zettelkasten notes (atomic ideas) from the chapter. Format each as a brief title followed by a concise explanation.
3. List any authors, books, or papers mentioned in the chapter, with full citations where possible.
4. For key topics (relevant proper nouns such as a species, a social movement, a period of history or a person of note), create Wikipedia-style markdown links, e.g., [Topic](https://en.wikipedia.org/wiki/Topic).
5. List open questions or thoughts for the next chapter.
6. If the chapter is a table of contents, an appendix, or references, note this and give a brief description instead of a full analysis.
7. Highlight particularly insightful quotes from the chapter using markdown quote formatting.

## Output Format

Respond in markdown, starting with a header for the chapter name, followed by the summary, Zettelkasten notes, references, key topics, questions, and other notes.
Be thorough but concise, focusing on the most important and interesting aspects of the chapter.`;
  }

  protected buildUserPrompt(input: ChapterAnalysisInput): string {
    return `Analyze the following chapter: ${input.chapterKey}

Chapter content:
${input.content}

Previous analysis (scratchpad):
${input.scratchpad}`;
  }
}
