import { APICallError, RetryError } from 'ai';

const RATE_LIMIT_STATUS = 429;

/**
 * TextGenerationError
 *
 * Hard failure of the text generation service. Callers that cannot recover
 * turn it into placeholder text instead of aborting a whole run.
 */
export class TextGenerationError extends Error {
  /**
   * Whether waiting and retrying may succeed
   */
  readonly isTransient: boolean = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TextGenerationError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create a typed generation error from an AI SDK (or unknown) error
   *
   * Rate limit responses, also when wrapped in the SDK's RetryError,
   * become RateLimitError. Errors that are already typed pass through.
   */
  static fromError(context: string, error: unknown): TextGenerationError {
    if (error instanceof TextGenerationError) {
      return error;
    }

    const message = `${context}: ${TextGenerationError.getErrorMessage(error)}`;

    if (TextGenerationError.isRateLimit(error)) {
      return new RateLimitError(message, { cause: error });
    }

    return new TextGenerationError(message, { cause: error });
  }

  private static isRateLimit(error: unknown): boolean {
    if (APICallError.isInstance(error)) {
      return error.statusCode === RATE_LIMIT_STATUS;
    }
    if (RetryError.isInstance(error)) {
      return TextGenerationError.isRateLimit(error.lastError);
    }
    return false;
  }
}

/**
 * RateLimitError
 *
 * Transient failure: the service asked the caller to slow down.
 */
export class RateLimitError extends TextGenerationError {
  override readonly isTransient: boolean = true;

  constructor(message = 'Rate limit reached', options?: ErrorOptions) {
    super(message, options);
    this.name = 'RateLimitError';
  }
}

/**
 * Whether the error signals a cancelled operation
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Create the error thrown when an operation notices its signal was aborted
 */
export function createAbortError(message: string): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}
