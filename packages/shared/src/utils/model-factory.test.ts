import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createTogetherAI } from '@ai-sdk/togetherai';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { createModel } from './model-factory';

vi.mock('@ai-sdk/openai', () => ({ createOpenAI: vi.fn() }));
vi.mock('@ai-sdk/anthropic', () => ({ createAnthropic: vi.fn() }));
vi.mock('@ai-sdk/google', () => ({ createGoogleGenerativeAI: vi.fn() }));
vi.mock('@ai-sdk/togetherai', () => ({ createTogetherAI: vi.fn() }));

describe('createModel', () => {
  const env = {
    OPENAI_API_KEY: 'test-openai-key',
    ANTHROPIC_API_KEY: 'test-anthropic-key',
    GOOGLE_GENERATIVE_AI_API_KEY: 'test-google-key',
    TOGETHER_AI_API_KEY: 'test-together-key',
  };

  const providerFn = (name: string) =>
    vi.fn((modelName: string) => ({ modelId: modelName, provider: name }));

  beforeEach(() => {
    vi.mocked(createOpenAI).mockReturnValue(
      providerFn('openai') as unknown as ReturnType<typeof createOpenAI>,
    );
    vi.mocked(createAnthropic).mockReturnValue(
      providerFn('anthropic') as unknown as ReturnType<typeof createAnthropic>,
    );
    vi.mocked(createGoogleGenerativeAI).mockReturnValue(
      providerFn('google') as unknown as ReturnType<
        typeof createGoogleGenerativeAI
      >,
    );
    vi.mocked(createTogetherAI).mockReturnValue(
      providerFn('together') as unknown as ReturnType<typeof createTogetherAI>,
    );
  });

  test('should create an OpenAI model with the API key from env', () => {
    const model = createModel('openai/gpt-4o-mini', env);

    expect(createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-openai-key' });
    expect(model).toEqual({ modelId: 'gpt-4o-mini', provider: 'openai' });
  });

  test('should create an Anthropic model', () => {
    const model = createModel('anthropic/claude-3-5-haiku-latest', env);

    expect(createAnthropic).toHaveBeenCalledWith({
      apiKey: 'test-anthropic-key',
    });
    expect(model).toEqual({
      modelId: 'claude-3-5-haiku-latest',
      provider: 'anthropic',
    });
  });

  test('should create a Google model', () => {
    createModel('google/gemini-2.0-flash', env);

    expect(createGoogleGenerativeAI).toHaveBeenCalledWith({
      apiKey: 'test-google-key',
    });
  });

  test('should keep slashes in Together model names', () => {
    const model = createModel(
      'together/meta-llama/Llama-3.3-70B-Instruct-Turbo',
      env,
    );

    expect(createTogetherAI).toHaveBeenCalledWith({
      apiKey: 'test-together-key',
    });
    expect(model).toEqual({
      modelId: 'meta-llama/Llama-3.3-70B-Instruct-Turbo',
      provider: 'together',
    });
  });

  test('should throw for an unknown provider', () => {
    expect(() => createModel('ollama/llama3.1', env)).toThrow(
      'Unknown provider: ollama',
    );
  });

  test('should throw when the model name is missing', () => {
    expect(() => createModel('openai', env)).toThrow(
      'Missing model name in model ID: openai',
    );
  });

  test('should throw when the provider API key is missing', () => {
    expect(() => createModel('openai/gpt-4o-mini', {})).toThrow(
      'OPENAI_API_KEY is required for openai models',
    );
    expect(createOpenAI).not.toHaveBeenCalled();
  });

  test('should treat an empty API key as missing', () => {
    expect(() =>
      createModel('openai/gpt-4o-mini', { ...env, OPENAI_API_KEY: '' }),
    ).toThrow('OPENAI_API_KEY is required for openai models');
  });

  test('should ignore empty keys of other providers', () => {
    createModel('anthropic/claude-3-5-haiku-latest', {
      ...env,
      OPENAI_API_KEY: '',
    });

    expect(createAnthropic).toHaveBeenCalledWith({
      apiKey: 'test-anthropic-key',
    });
  });
});
