/**
 * Token usage report types
 *
 * Breaks LLM token consumption down by component, phase and model type
 * (primary vs fallback).
 */

/**
 * Token usage report for a splitting or review run
 */
export interface TokenUsageReport {
  /**
   * Breakdown by component
   *
   * Components are ordered by their first LLM call.
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components and phases
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific component
 *
 * Examples: TocExtractor, ChapterAnalyzer, ChapterQuestionAnswerer
 */
export interface ComponentUsageReport {
  component: string;

  /**
   * Breakdown by phase within this component
   */
  phases: PhaseUsageReport[];

  /**
   * Sum of all phases within this component
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a specific phase
 *
 * A phase may use both primary and fallback models when the primary model
 * fails and a fallback model is configured.
 */
export interface PhaseUsageReport {
  /**
   * Phase name set by the calling component
   *
   * Examples: 'extraction', 'analysis', 'question'
   */
  phase: string;

  /**
   * Usage by the primary model, present when it succeeded at least once
   *
   * Failed primary attempts are not recorded.
   */
  primary?: ModelUsageDetail;

  /**
   * Usage by the fallback model, present when it answered after a primary failure
   */
  fallback?: ModelUsageDetail;

  /**
   * Sum of primary and fallback usage
   */
  total: TokenUsageSummary;
}

/**
 * Token counts for one model within a phase
 */
export interface ModelUsageDetail {
  /**
   * Model identifier as reported by the provider (e.g. 'gpt-4o-mini')
   */
  modelName: string;

  /**
   * Tokens in the prompt (system + user input)
   */
  inputTokens: number;

  outputTokens: number;
  totalTokens: number;
}

export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
