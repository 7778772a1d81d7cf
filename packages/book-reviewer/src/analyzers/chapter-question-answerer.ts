import type { LoggerMethods } from '@chapterwise/logger';
import type {
  LLMTokenUsageAggregator,
  TextGenerator,
} from '@chapterwise/shared';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '@chapterwise/book-splitter';
import { TextGenerationError, isAbortError } from '@chapterwise/shared';

export interface ChapterQuestionInput {
  question: string;
  chapterKey: string;
  content: string;
}

/**
 * ChapterQuestionAnswerer
 *
 * Answers a reader's question from one chapter's content. Failures become
 * an error answer instead of an exception; aborts are re-thrown.
 */
export class ChapterQuestionAnswerer extends TextLLMComponent {
  constructor(
    logger: LoggerMethods,
    generator: TextGenerator,
    options?: BaseLLMComponentOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, generator, 'ChapterQuestionAnswerer', options, aggregator);
  }

  async answer(input: ChapterQuestionInput): Promise<string> {
    this.log('info', `Answering a question about ${input.chapterKey}`);

    try {
      const result = await this.callTextLLM(
        this.buildSystemPrompt(),
        this.buildUserPrompt(input),
        'question',
      );
      return result.output;
    } catch (error) {
      if (isAbortError(error) || this.abortSignal?.aborted) {
        throw error;
      }

      const message = TextGenerationError.getErrorMessage(error);
      this.log('error', `Answering failed: ${message}`);
      return `Error: An error occurred while answering the question. Error: ${message}`;
    }
  }

  protected buildSystemPrompt(): string {
    return 'You answer questions about a single chapter of a book. Give a clear and concise answer that focuses on the content of that chapter. Use markdown formatting.';
  }

  protected buildUserPrompt(input: ChapterQuestionInput): string {
    return `You are analyzing the following chapter: ${input.chapterKey}

Chapter content:
${input.content}

The user has asked the following question about this chapter:
${input.question}`;
  }
}
