import type { LLMProvider } from './llm-provider';
import { AnthropicProvider, type AnthropicConfig } from './anthropic-provider';
import { OpenAIProvider, type OpenAIConfig } from './openai-provider';
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from './embedding-provider';
import type { RequestBuilder } from './request-builder';
import type { DebugOptions } from './structured-output';
import type { EnvConfig } from '../schemas/env-schemas';

export type ProviderOptions = DebugOptions;

export enum ProviderType {
  Anthropic = 'anthropic',
  OpenAI = 'openai',
}

function debugFields(options: ProviderOptions): DebugOptions {
  return {
    ...(options.debug !== undefined && { debug: options.debug }),
    ...(options.showPrompt !== undefined && { showPrompt: options.showPrompt }),
    ...(options.showPromptTrunc !== undefined && { showPromptTrunc: options.showPromptTrunc }),
    ...(options.debugJson !== undefined && { debugJson: options.debugJson }),
  };
}

/**
 * Creates the LLM provider selected by LLM_PROVIDER.
 * @param builder - Optional request builder (for dependency injection)
 */
export function createProvider(
  envConfig: EnvConfig,
  options: ProviderOptions = {},
  builder?: RequestBuilder
): LLMProvider {
  switch (envConfig.LLM_PROVIDER) {
    case ProviderType.Anthropic: {
      const anthropicConfig: AnthropicConfig = {
        apiKey: envConfig.ANTHROPIC_API_KEY,
        model: envConfig.ANTHROPIC_MODEL,
        maxTokens: envConfig.ANTHROPIC_MAX_TOKENS,
        ...(envConfig.ANTHROPIC_TEMPERATURE !== undefined && { temperature: envConfig.ANTHROPIC_TEMPERATURE }),
        ...debugFields(options),
      };
      return new AnthropicProvider(anthropicConfig, builder);
    }

    case ProviderType.OpenAI: {
      const openaiConfig: OpenAIConfig = {
        apiKey: envConfig.OPENAI_API_KEY,
        model: envConfig.OPENAI_MODEL,
        ...(envConfig.OPENAI_TEMPERATURE !== undefined && { temperature: envConfig.OPENAI_TEMPERATURE }),
        ...debugFields(options),
      };
      return new OpenAIProvider(openaiConfig, builder);
    }
  }
}

/**
 * Embedding provider for retrieval. Uses EMBEDDING_API_KEY, falling back to
 * OPENAI_API_KEY when the chat provider is OpenAI. Returns undefined when no
 * key is available.
 */
export function createEmbeddingProvider(envConfig: EnvConfig): EmbeddingProvider | undefined {
  const apiKey =
    envConfig.EMBEDDING_API_KEY ??
    (envConfig.LLM_PROVIDER === ProviderType.OpenAI ? envConfig.OPENAI_API_KEY : undefined);
  if (!apiKey) return undefined;
  return new OpenAIEmbeddingProvider({ apiKey, model: envConfig.EMBEDDING_MODEL });
}
