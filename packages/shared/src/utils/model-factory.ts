import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createTogetherAI } from '@ai-sdk/togetherai';
import { z } from 'zod';

/**
 * Provider API keys read from the environment
 */
export const ProviderEnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  GOOGLE_GENERATIVE_AI_API_KEY: z.string().min(1).optional(),
  TOGETHER_AI_API_KEY: z.string().min(1).optional(),
});

export type ProviderEnv = z.infer<typeof ProviderEnvSchema>;

export type ModelProvider = 'openai' | 'anthropic' | 'google' | 'together';

const PROVIDER_KEYS: Record<ModelProvider, keyof ProviderEnv> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
  together: 'TOGETHER_AI_API_KEY',
};

function isModelProvider(value: string): value is ModelProvider {
  return Object.hasOwn(PROVIDER_KEYS, value);
}

/**
 * Converts a model ID string to a LanguageModel instance
 *
 * Model ID format: "provider/model-name"
 * Examples:
 *   - "openai/gpt-4o-mini"
 *   - "anthropic/claude-3-5-haiku-latest"
 *   - "google/gemini-2.0-flash"
 *   - "together/meta-llama/Llama-3.3-70B-Instruct-Turbo"
 *
 * @param env - Environment holding the provider API keys (default: process.env)
 * @throws {Error} When the provider is unknown or has no non-empty API key
 */
export function createModel(
  modelId: string,
  env: Record<string, string | undefined> = process.env,
): LanguageModel {
  const [provider, ...rest] = modelId.split('/');
  const modelName = rest.join('/');

  if (!isModelProvider(provider)) {
    throw new Error(`Unknown provider: ${provider}`);
  }
  if (!modelName) {
    throw new Error(`Missing model name in model ID: ${modelId}`);
  }

  const keyName = PROVIDER_KEYS[provider];
  const parsedKey = ProviderEnvSchema.shape[keyName].safeParse(env[keyName]);
  const apiKey = parsedKey.success ? parsedKey.data : undefined;
  if (!apiKey) {
    throw new Error(`${keyName} is required for ${provider} models`);
  }

  switch (provider) {
    case 'openai':
      return createOpenAI({ apiKey })(modelName);
    case 'anthropic':
      return createAnthropic({ apiKey })(modelName);
    case 'google':
      return createGoogleGenerativeAI({ apiKey })(modelName);
    case 'together':
      return createTogetherAI({ apiKey })(modelName);
  }
}
