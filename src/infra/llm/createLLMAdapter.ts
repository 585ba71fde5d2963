import { createOpenAI } from '@ai-sdk/openai';
import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';
import type { Env } from '../env.js';
import { logger } from '../logger.js';
import type { LLMAdapter } from './LLMAdapter.js';
import { LLMProviderAdapter } from './LLMProviderAdapter.js';

/** Generation backend selected from the environment */
export interface ResolvedProvider {
  label: string;
  /** Model used when LLM_MODEL is unset */
  fallbackModel: string;
  keyVariable: string;
  apiKey: string | undefined;
  modelFactory: (modelId: string) => LanguageModel;
}

export function resolveProvider(env: Env): ResolvedProvider {
  switch (env.LLM_PROVIDER) {
    case 'anthropic': {
      const anthropic = createAnthropic({ apiKey: env.ANTHROPIC_API_KEY });
      return {
        label: 'Anthropic',
        fallbackModel: 'claude-3-5-haiku-latest',
        keyVariable: 'ANTHROPIC_API_KEY',
        apiKey: env.ANTHROPIC_API_KEY,
        modelFactory: (modelId) => anthropic(modelId),
      };
    }
    case 'google': {
      const google = createGoogleGenerativeAI({ apiKey: env.GOOGLE_API_KEY });
      return {
        label: 'Google Gemini',
        fallbackModel: 'gemini-2.0-flash',
        keyVariable: 'GOOGLE_API_KEY',
        apiKey: env.GOOGLE_API_KEY,
        modelFactory: (modelId) => google(modelId),
      };
    }
    case 'openai': {
      const openai = createOpenAI({ apiKey: env.OPENAI_API_KEY });
      return {
        label: 'OpenAI',
        fallbackModel: 'gpt-4o-mini',
        keyVariable: 'OPENAI_API_KEY',
        apiKey: env.OPENAI_API_KEY,
        modelFactory: (modelId) => openai(modelId),
      };
    }
  }
}

/**
 * Build the adapter for the provider selected by LLM_PROVIDER
 * An unconfigured provider is still returned; calls then fail with reason `not_configured`.
 */
export function createLLMAdapter(env: Env): LLMAdapter {
  const provider = resolveProvider(env);
  const model = env.LLM_MODEL ?? provider.fallbackModel;
  const configured = Boolean(provider.apiKey);

  if (configured) {
    logger.info('Using LLM provider', { provider: provider.label, model });
  } else {
    logger.warn(`${provider.label} selected but ${provider.keyVariable} is not set`, {
      provider: env.LLM_PROVIDER,
    });
  }

  return new LLMProviderAdapter({
    providerId: env.LLM_PROVIDER,
    defaultModel: model,
    modelFactory: provider.modelFactory,
    isConfigured: () => configured,
  });
}
