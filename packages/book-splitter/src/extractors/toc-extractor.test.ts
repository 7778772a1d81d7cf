import type { LoggerMethods } from '@chapterwise/logger';
import type { ExtendedTokenUsage, TextGenerator } from '@chapterwise/shared';
import type { Mock } from 'vitest';

import {
  LLMTokenUsageAggregator,
  RateLimitError,
  TextGenerationError,
} from '@chapterwise/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { BookDocument } from '../utils/book-document';
import { TocExtractor } from './toc-extractor';

const usage: ExtendedTokenUsage = {
  component: 'TocExtractor',
  phase: 'extraction',
  model: 'primary',
  modelName: 'test-model',
  inputTokens: 500,
  outputTokens: 20,
  totalTokens: 520,
};

const BOOK = [
  'CONTENTS',
  '1. Intro',
  '2. Middle',
  '',
  '1. Intro',
  'Once upon a time.',
].join('\n');

describe('TocExtractor', () => {
  let mockLogger: LoggerMethods;
  let generate: Mock<TextGenerator['generate']>;
  let generator: TextGenerator;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    generate = vi.fn<TextGenerator['generate']>();
    generator = { generate };
  });

  test('should return parsed titles and usage', async () => {
    generate.mockResolvedValue({ text: 'Intro\nMiddle\n', usage });
    const extractor = new TocExtractor(mockLogger, generator);

    const result = await extractor.extract(new BookDocument(BOOK));

    expect(result).toEqual({ titles: ['Intro', 'Middle'], usage });
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[TocExtractor] Extraction completed: 2 titles',
    );
  });

  test('should send only the configured prefix of the book', async () => {
    generate.mockResolvedValue({ text: 'Intro', usage });
    const extractor = new TocExtractor(mockLogger, generator, {
      tocPrefixLength: 11,
    });

    await extractor.extract(new BookDocument(BOOK));

    const request = generate.mock.calls[0][0];
    expect(request.component).toBe('TocExtractor');
    expect(request.phase).toBe('extraction');
    expect(request.systemPrompt).toContain('NO_TABLE_OF_CONTENTS');
    expect(request.userPrompt.endsWith('\n\nCONTENTS\n1.')).toBe(true);
    expect(request.userPrompt).not.toContain('Intro');
  });

  test('should send 2000 characters by default', async () => {
    generate.mockResolvedValue({ text: 'Intro', usage });
    const text = 'a'.repeat(2500);
    const extractor = new TocExtractor(mockLogger, generator);

    await extractor.extract(new BookDocument(text));

    const { userPrompt } = generate.mock.calls[0][0];
    expect(userPrompt.endsWith(`\n\n${'a'.repeat(2000)}`)).toBe(true);
    expect(userPrompt).not.toContain('a'.repeat(2001));
  });

  test('should return no titles when the model reports no TOC', async () => {
    generate.mockResolvedValue({ text: 'NO_TABLE_OF_CONTENTS', usage });
    const extractor = new TocExtractor(mockLogger, generator);

    const result = await extractor.extract(new BookDocument(BOOK));

    expect(result.titles).toEqual([]);
  });

  test('should apply the maximum title length', async () => {
    generate.mockResolvedValue({ text: 'Intro\nA very long line', usage });
    const extractor = new TocExtractor(mockLogger, generator, {
      maxTitleLength: 5,
    });

    const result = await extractor.extract(new BookDocument(BOOK));

    expect(result.titles).toEqual(['Intro']);
  });

  test('should skip the call for an empty document start', async () => {
    const extractor = new TocExtractor(mockLogger, generator);

    const result = await extractor.extract(new BookDocument('  \n\n  '));

    expect(result.titles).toEqual([]);
    expect(result.usage.totalTokens).toBe(0);
    expect(result.usage.modelName).toBe('none');
    expect(generate).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[TocExtractor] Document start is empty, skipping TOC extraction',
    );
  });

  test('should track usage in the aggregator', async () => {
    generate.mockResolvedValue({ text: 'Intro', usage });
    const aggregator = new LLMTokenUsageAggregator();
    const extractor = new TocExtractor(
      mockLogger,
      generator,
      undefined,
      aggregator,
    );

    await extractor.extract(new BookDocument(BOOK));

    expect(aggregator.getTotalUsage().totalTokens).toBe(520);
  });

  test('should propagate rate limit errors unchanged', async () => {
    const error = new RateLimitError();
    generate.mockRejectedValue(error);
    const extractor = new TocExtractor(mockLogger, generator);

    await expect(extractor.extract(new BookDocument(BOOK))).rejects.toBe(
      error,
    );
    expect(generate).toHaveBeenCalledTimes(1);
  });

  test('should log and propagate hard failures', async () => {
    const error = new TextGenerationError('service down');
    generate.mockRejectedValue(error);
    const extractor = new TocExtractor(mockLogger, generator);

    await expect(extractor.extract(new BookDocument(BOOK))).rejects.toBe(
      error,
    );
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[TocExtractor] Extraction failed: service down',
    );
  });
});
