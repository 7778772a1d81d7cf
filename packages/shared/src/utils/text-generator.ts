import type { LanguageModel } from 'ai';

import type { ExtendedTokenUsage } from './llm-caller';

import {
  TextGenerationError,
  isAbortError,
} from '../errors/text-generation-error';
import { LLMCaller } from './llm-caller';

/**
 * A single text generation request
 */
export interface TextGenerationRequest {
  systemPrompt?: string;
  userPrompt: string;

  /**
   * Component name for usage tracking (e.g., 'TocExtractor')
   */
  component: string;

  /**
   * Phase name for usage tracking (e.g., 'extraction')
   */
  phase: string;

  abortSignal?: AbortSignal;
}

export interface TextGenerationResult {
  text: string;
  usage: ExtendedTokenUsage;
}

/**
 * Text generation capability: prompt in, text out
 *
 * Implementations reject with RateLimitError for transient failures and
 * TextGenerationError for everything else (aborts are re-thrown as-is).
 * Tests substitute a deterministic stub.
 */
export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<TextGenerationResult>;
}

/**
 * Options for LLMTextGenerator
 */
export interface LLMTextGeneratorOptions {
  /**
   * Primary language model
   */
  model: LanguageModel;

  /**
   * Model tried after the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Retries performed by the AI SDK itself per model (default: 0)
   *
   * Kept at 0 when callers wrap their own backoff policy around generate().
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;
}

/**
 * TextGenerator backed by the AI SDK through LLMCaller
 */
export class LLMTextGenerator implements TextGenerator {
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly maxRetries: number;
  private readonly temperature: number;

  constructor(options: LLMTextGeneratorOptions) {
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.maxRetries = options.maxRetries ?? 0;
    this.temperature = options.temperature ?? 0;
  }

  async generate(
    request: TextGenerationRequest,
  ): Promise<TextGenerationResult> {
    try {
      const result = await LLMCaller.callText({
        systemPrompt: request.systemPrompt,
        userPrompt: request.userPrompt,
        primaryModel: this.model,
        fallbackModel: this.fallbackModel,
        maxRetries: this.maxRetries,
        temperature: this.temperature,
        abortSignal: request.abortSignal,
        component: request.component,
        phase: request.phase,
      });

      return { text: result.output, usage: result.usage };
    } catch (error) {
      if (isAbortError(error) || request.abortSignal?.aborted) {
        throw error;
      }
      throw TextGenerationError.fromError(
        `[${request.component}] Text generation failed (${request.phase})`,
        error,
      );
    }
  }
}
