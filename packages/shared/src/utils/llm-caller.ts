import { type LanguageModel, generateText } from 'ai';

/**
 * Configuration for a free-form text LLM call with fallback support
 */
export interface LLMTextCallConfig {
  /**
   * System prompt for LLM (optional)
   */
  systemPrompt?: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model has failed (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Retry count handed to the AI SDK for each model
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'TocExtractor', 'ChapterAnalyzer')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'extraction', 'analysis')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface ModelResponse<TOutput> {
  output: TOutput;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * LLMCaller - Centralized LLM API caller with fallback support
 *
 * Wraps AI SDK's generateText:
 * 1. Try primary model (the SDK retries retryable errors up to maxRetries)
 * 2. If it fails and fallbackModel is provided, try the fallback model
 * 3. Return usage data with model type indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.callText({
 *   systemPrompt: 'You extract tables of contents',
 *   userPrompt: 'List the chapters of this text: ...',
 *   primaryModel: openai('gpt-4o-mini'),
 *   fallbackModel: anthropic('claude-3-5-haiku-latest'),
 *   maxRetries: 0,
 *   component: 'TocExtractor',
 *   phase: 'extraction',
 * });
 *
 * console.log(result.output);        // Generated text
 * console.log(result.usedFallback);  // Whether fallback was used
 * ```
 */
export class LLMCaller {
  private static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: LLMTextCallConfig,
    modelName: string,
    response: ModelResponse<unknown>,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  /**
   * Execute LLM call with fallback support
   *
   * An aborted call never falls back.
   */
  private static async executeWithFallback<TOutput>(
    config: LLMTextCallConfig,
    generateFn: (model: LanguageModel) => Promise<ModelResponse<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await generateFn(config.primaryModel);

      return {
        output: response.output,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted) {
        throw primaryError;
      }

      if (!config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await generateFn(config.fallbackModel);

      return {
        output: response.output,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }

  /**
   * Call LLM for free-form text
   *
   * @returns Result with the generated text and usage information
   * @throws The AI SDK error of the last attempted model
   */
  static async callText(
    config: LLMTextCallConfig,
  ): Promise<LLMCallResult<string>> {
    return this.executeWithFallback(config, async (model) => {
      const response = await generateText({
        model,
        system: config.systemPrompt,
        prompt: config.userPrompt,
        temperature: config.temperature,
        maxRetries: config.maxRetries,
        abortSignal: config.abortSignal,
      });

      return { output: response.text, usage: response.usage };
    });
  }
}
