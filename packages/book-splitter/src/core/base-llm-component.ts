import type { LoggerMethods } from '@chapterwise/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
  TextGenerator,
} from '@chapterwise/shared';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - A shared text generation capability
 *
 * Subclasses must implement buildSystemPrompt() and buildUserPrompt().
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly generator: TextGenerator;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;
  protected readonly abortSignal?: AbortSignal;

  /**
   * @param logger - Logger instance for logging
   * @param generator - Text generation capability used for every call
   * @param componentName - Name of the component for logging (e.g., "TocExtractor")
   * @param options - Optional configuration (abortSignal)
   * @param aggregator - Optional token usage aggregator for tracking LLM calls
   */
  constructor(
    logger: LoggerMethods,
    generator: TextGenerator,
    componentName: string,
    options?: BaseLLMComponentOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.generator = generator;
    this.componentName = componentName;
    this.aggregator = aggregator;
    this.abortSignal = options?.abortSignal;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }

  /**
   * Create an empty usage record for edge cases (e.g., empty input)
   */
  protected createEmptyUsage(phase: string): ExtendedTokenUsage {
    return {
      component: this.componentName,
      phase,
      model: 'primary',
      modelName: 'none',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    };
  }

  /**
   * Build system prompt for LLM call
   */
  protected abstract buildSystemPrompt(...args: unknown[]): string;

  /**
   * Build user prompt for LLM call
   *
   * Subclasses must implement this to construct prompts from input data.
   */
  protected abstract buildUserPrompt(...args: unknown[]): string;
}
