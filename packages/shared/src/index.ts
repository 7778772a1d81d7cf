export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallResult,
  type LLMTextCallConfig,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  type TokenUsage,
} from './utils/llm-token-usage-aggregator';
export {
  LLMTextGenerator,
  type LLMTextGeneratorOptions,
  type TextGenerationRequest,
  type TextGenerationResult,
  type TextGenerator,
} from './utils/text-generator';
export {
  retryWithBackoff,
  type RetryWithBackoffOptions,
} from './utils/retry-with-backoff';
export {
  createModel,
  ProviderEnvSchema,
  type ModelProvider,
  type ProviderEnv,
} from './utils/model-factory';
export {
  RateLimitError,
  TextGenerationError,
  createAbortError,
  isAbortError,
} from './errors/text-generation-error';
