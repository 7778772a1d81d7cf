import { describe, expect, test } from 'vitest';

import { ChapterNotFoundError } from './chapter-not-found-error';

describe('ChapterNotFoundError', () => {
  test('should carry the stage and a stage message', () => {
    const error = new ChapterNotFoundError('scan');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ChapterNotFoundError');
    expect(error.stage).toBe('scan');
    expect(error.message).toBe('No chapter title occurs in the document');
  });

  test('should describe each stage', () => {
    expect(new ChapterNotFoundError('reconcile').message).toBe(
      'No chapter start survived reconciliation',
    );
    expect(new ChapterNotFoundError('materialize').message).toBe(
      'Cannot build chapter ranges without chapter starts',
    );
  });

  test('should accept a custom message', () => {
    expect(new ChapterNotFoundError('scan', 'none').message).toBe('none');
  });
});
