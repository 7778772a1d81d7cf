import type { LoggerMethods } from '@chapterwise/logger';
import type {
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@chapterwise/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Token usage totals
 */
export type TokenUsage = TokenUsageSummary;

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

/**
 * Aggregated token usage for a specific component
 */
interface ComponentAggregate {
  component: string;
  phases: Record<
    string,
    {
      primary?: ModelUsageDetail;
      fallback?: ModelUsageDetail;
      total: TokenUsage;
    }
  >;
  total: TokenUsage;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage data from all components and logs a summary at the end of
 * a run.
 *
 * Tracks usage by:
 * - Component (TocExtractor, ChapterAnalyzer, etc.)
 * - Phase (extraction, analysis, question, etc.)
 * - Model (primary vs fallback)
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'TocExtractor',
 *   phase: 'extraction',
 *   model: 'primary',
 *   modelName: 'gpt-4o-mini',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 *
 * aggregator.logSummary(logger);
 * // [TokenUsage] Token usage summary:
 * // TocExtractor:
 * //   - extraction:
 * //       primary (gpt-4o-mini): 1500 input, 300 output, 1800 total
 * //       subtotal: 1500 input, 300 output, 1800 total
 * //   TocExtractor total: 1500 input, 300 output, 1800 total
 * // --- Summary ---
 * // Primary total: 1500 input, 300 output, 1800 total
 * // Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private usage: Record<string, ComponentAggregate> = {};

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    if (!this.usage[usage.component]) {
      this.usage[usage.component] = {
        component: usage.component,
        phases: {},
        total: emptyUsage(),
      };
    }

    const component = this.usage[usage.component];

    if (!component.phases[usage.phase]) {
      component.phases[usage.phase] = { total: emptyUsage() };
    }

    const phase = component.phases[usage.phase];

    let detail = phase[usage.model];
    if (!detail) {
      detail = { modelName: usage.modelName, ...emptyUsage() };
      phase[usage.model] = detail;
    }
    addUsage(detail, usage);

    addUsage(phase.total, usage);
    addUsage(component.total, usage);
  }

  /**
   * Get aggregated usage grouped by component
   */
  getByComponent(): ComponentAggregate[] {
    return Object.values(this.usage);
  }

  /**
   * Get token usage report in structured JSON format
   *
   * Returns copies, so later tracking does not change a report already handed out.
   */
  getReport(): TokenUsageReport {
    const components = Object.values(this.usage).map((component) => {
      const phases = Object.entries(component.phases).map(
        ([phaseName, phaseData]) => {
          const phaseReport: PhaseUsageReport = {
            phase: phaseName,
            total: { ...phaseData.total },
          };

          if (phaseData.primary) {
            phaseReport.primary = { ...phaseData.primary };
          }

          if (phaseData.fallback) {
            phaseReport.fallback = { ...phaseData.fallback };
          }

          return phaseReport;
        },
      );

      return {
        component: component.component,
        phases,
        total: { ...component.total },
      };
    });

    return { components, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all components and phases
   */
  getTotalUsage(): TokenUsage {
    const total = emptyUsage();

    for (const component of Object.values(this.usage)) {
      addUsage(total, component.total);
    }

    return total;
  }

  /**
   * Log token usage summary
   *
   * Outputs usage grouped by component, with phase and model breakdown.
   * Call this once at the end of a run.
   */
  logSummary(logger: LoggerMethods, prefix = '[TokenUsage]'): void {
    const components = this.getByComponent();

    if (components.length === 0) {
      logger.info(`${prefix} No token usage to report`);
      return;
    }

    logger.info(`${prefix} Token usage summary:`);

    const primaryTotal = emptyUsage();
    const fallbackTotal = emptyUsage();

    for (const component of components) {
      logger.info(`${component.component}:`);

      for (const [phase, phaseData] of Object.entries(component.phases)) {
        logger.info(`  - ${phase}:`);

        if (phaseData.primary) {
          logger.info(
            `      primary (${phaseData.primary.modelName}): ${formatTokens(phaseData.primary)}`,
          );
          addUsage(primaryTotal, phaseData.primary);
        }

        if (phaseData.fallback) {
          logger.info(
            `      fallback (${phaseData.fallback.modelName}): ${formatTokens(phaseData.fallback)}`,
          );
          addUsage(fallbackTotal, phaseData.fallback);
        }

        logger.info(`      subtotal: ${formatTokens(phaseData.total)}`);
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    logger.info('--- Summary ---');
    if (primaryTotal.totalTokens > 0) {
      logger.info(`Primary total: ${formatTokens(primaryTotal)}`);
    }
    if (fallbackTotal.totalTokens > 0) {
      logger.info(`Fallback total: ${formatTokens(fallbackTotal)}`);
    }
    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  /**
   * Reset all tracked usage
   *
   * Call this at the start of a new run.
   */
  reset(): void {
    this.usage = {};
  }
}
