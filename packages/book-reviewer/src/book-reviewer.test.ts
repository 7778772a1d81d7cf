import type { LoggerMethods } from '@chapterwise/logger';
import type {
  TextGenerationRequest,
  TextGenerationResult,
  TextGenerator,
} from '@chapterwise/shared';
import type { Mock } from 'vitest';

import type { BookReviewerOptions } from './book-reviewer';

import { TocNotFoundError } from '@chapterwise/book-splitter';
import { TextGenerationError } from '@chapterwise/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { BookReviewer } from './book-reviewer';

const BOOK = [
  'CONTENTS',
  '1. Intro',
  'body',
  'body',
  '2. Middle',
  'body',
].join('\n');

function respond(
  request: TextGenerationRequest,
  text: string,
): TextGenerationResult {
  return {
    text,
    usage: {
      component: request.component,
      phase: request.phase,
      model: 'primary',
      modelName: 'test-model',
      inputTokens: 10,
      outputTokens: 5,
      totalTokens: 15,
    },
  };
}

/**
 * TOC answer for the splitter, numbered analyses for chapters
 */
function scriptedGenerator(
  generate: Mock<TextGenerator['generate']>,
): void {
  let analysisCount = 0;
  generate.mockImplementation(async (request) => {
    if (request.component === 'TocExtractor') {
      return respond(request, 'Intro\nMiddle');
    }
    if (request.component === 'ChapterAnalyzer') {
      analysisCount++;
      return respond(request, `Analysis ${analysisCount}`);
    }
    return respond(request, 'An answer');
  });
}

describe('BookReviewer', () => {
  let mockLogger: LoggerMethods;
  let generate: Mock<TextGenerator['generate']>;
  let textGenerator: TextGenerator;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    generate = vi.fn<TextGenerator['generate']>();
    textGenerator = { generate };
  });

  test('should analyze every chapter in document order', async () => {
    scriptedGenerator(generate);
    const reviewer = new BookReviewer({
      logger: mockLogger,
      textGenerator,
      splitterSettings: { minChapterGap: 3 },
    });

    const review = await reviewer.review('Sample Book', BOOK);

    expect(review.bookTitle).toBe('Sample Book');
    expect(
      review.chapters.map((entry) => [
        entry.chapter.key,
        entry.analysis.text,
        entry.analysis.status,
      ]),
    ).toEqual([
      ['0000_Preface', 'Analysis 1', 'completed'],
      ['0002_Intro', 'Analysis 2', 'completed'],
      ['0005_Middle', 'Analysis 3', 'completed'],
    ]);
    expect(review.chapters.every((entry) => entry.questions.length === 0)).toBe(
      true,
    );
  });

  test('should thread the scratchpad from chapter to chapter', async () => {
    scriptedGenerator(generate);
    const reviewer = new BookReviewer({
      logger: mockLogger,
      textGenerator,
      splitterSettings: { minChapterGap: 3 },
      scratchpadLength: 3,
    });

    await reviewer.review('Sample Book', BOOK);

    const analysisPrompts = generate.mock.calls
      .map(([request]) => request)
      .filter((request) => request.component === 'ChapterAnalyzer')
      .map((request) => request.userPrompt);
    expect(analysisPrompts).toHaveLength(3);
    expect(
      analysisPrompts[0].endsWith('Previous analysis (scratchpad):\n'),
    ).toBe(true);
    expect(
      analysisPrompts[1].endsWith('Previous analysis (scratchpad):\ns 1'),
    ).toBe(true);
    expect(
      analysisPrompts[2].endsWith('Previous analysis (scratchpad):\ns 2'),
    ).toBe(true);
  });

  test('should report progress after each chapter', async () => {
    scriptedGenerator(generate);
    const onChapterAnalyzed =
      vi.fn<NonNullable<BookReviewerOptions['onChapterAnalyzed']>>();
    const reviewer = new BookReviewer({
      logger: mockLogger,
      textGenerator,
      splitterSettings: { minChapterGap: 3 },
      onChapterAnalyzed,
    });

    await reviewer.review('Sample Book', BOOK);

    expect(
      onChapterAnalyzed.mock.calls.map(([entry, index, total]) => [
        entry.chapter.key,
        index,
        total,
      ]),
    ).toEqual([
      ['0000_Preface', 0, 3],
      ['0002_Intro', 1, 3],
      ['0005_Middle', 2, 3],
    ]);
  });

  test('should keep going when one chapter analysis fails', async () => {
    let analysisCount = 0;
    generate.mockImplementation(async (request) => {
      if (request.component === 'TocExtractor') {
        return respond(request, 'Intro\nMiddle');
      }
      analysisCount++;
      if (analysisCount === 2) {
        throw new TextGenerationError('context too long');
      }
      return respond(request, `Analysis ${analysisCount}`);
    });
    const reviewer = new BookReviewer({
      logger: mockLogger,
      textGenerator,
      splitterSettings: { minChapterGap: 3 },
    });

    const review = await reviewer.review('Sample Book', BOOK);

    expect(review.chapters.map((entry) => entry.analysis.status)).toEqual([
      'completed',
      'failed',
      'completed',
    ]);
    expect(review.chapters[1].analysis.text).toBe(
      'Error: An unexpected error occurred while analyzing the chapter.\n\nChapter: 0002_Intro\nError: context too long',
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[BookReviewer] Review completed: 3 chapters, 1 without analysis',
    );
  });

  test('should aggregate usage of splitting and analysis', async () => {
    scriptedGenerator(generate);
    const reviewer = new BookReviewer({
      logger: mockLogger,
      textGenerator,
      splitterSettings: { minChapterGap: 3 },
    });

    const review = await reviewer.review('Sample Book', BOOK);

    expect(review.usage.components.map((c) => c.component)).toEqual([
      'TocExtractor',
      'ChapterAnalyzer',
    ]);
    expect(review.usage.total.totalTokens).toBe(60);
  });

  test('should propagate splitting failures', async () => {
    generate.mockImplementation(async (request) =>
      respond(request, 'NO_TABLE_OF_CONTENTS'),
    );
    const reviewer = new BookReviewer({ logger: mockLogger, textGenerator });

    await expect(reviewer.review('Sample Book', BOOK)).rejects.toBeInstanceOf(
      TocNotFoundError,
    );
  });

  test('should stop between chapters when aborted', async () => {
    const controller = new AbortController();
    let analysisCount = 0;
    generate.mockImplementation(async (request) => {
      if (request.component === 'TocExtractor') {
        return respond(request, 'Intro\nMiddle');
      }
      analysisCount++;
      controller.abort();
      return respond(request, `Analysis ${analysisCount}`);
    });
    const reviewer = new BookReviewer({
      logger: mockLogger,
      textGenerator,
      splitterSettings: { minChapterGap: 3 },
      abortSignal: controller.signal,
    });

    await expect(reviewer.review('Sample Book', BOOK)).rejects.toMatchObject({
      name: 'AbortError',
      message: 'Book review was aborted',
    });
    expect(analysisCount).toBe(1);
  });

  describe('ask', () => {
    test('should return a new entry with the answer appended', async () => {
      scriptedGenerator(generate);
      const reviewer = new BookReviewer({
        logger: mockLogger,
        textGenerator,
        splitterSettings: { minChapterGap: 3 },
      });
      const review = await reviewer.review('Sample Book', BOOK);
      const intro = review.chapters[1];

      const updated = await reviewer.ask(intro, 'What happens first?');

      expect(updated.questions).toEqual([
        { question: 'What happens first?', answer: 'An answer' },
      ]);
      expect(intro.questions).toEqual([]);
      expect(updated.chapter).toBe(intro.chapter);

      const request = generate.mock.calls.at(-1)?.[0];
      expect(request?.component).toBe('ChapterQuestionAnswerer');
      expect(request?.userPrompt).toContain('1. Intro\nbody\nbody');
      expect(
        reviewer
          .getUsageReport()
          .components.map((component) => component.component),
      ).toContain('ChapterQuestionAnswerer');
    });
  });
});
