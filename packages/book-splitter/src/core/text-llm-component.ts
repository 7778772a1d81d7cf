import type { ExtendedTokenUsage } from '@chapterwise/shared';

import { createAbortError } from '@chapterwise/shared';

import { BaseLLMComponent } from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-based LLM components
 *
 * Extends BaseLLMComponent with a helper for one prompt/response round trip
 * through the injected TextGenerator.
 *
 * Subclasses: TocExtractor, ChapterAnalyzer, ChapterQuestionAnswerer
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  /**
   * Call the text generator and track the call's usage
   *
   * @param phase - Phase name for tracking (e.g., 'extraction', 'analysis')
   * @throws AbortError when the abort signal fired before the call
   */
  protected async callTextLLM(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
  ): Promise<{ output: string; usage: ExtendedTokenUsage }> {
    if (this.abortSignal?.aborted) {
      throw createAbortError(`${this.componentName} call was aborted`);
    }

    const result = await this.generator.generate({
      systemPrompt,
      userPrompt,
      component: this.componentName,
      phase,
      abortSignal: this.abortSignal,
    });

    this.trackUsage(result.usage);

    return { output: result.text, usage: result.usage };
  }
}
