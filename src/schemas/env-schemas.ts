import { z } from 'zod';
import { ProviderType } from '../providers/provider-factory';
import { OpenAIDefaultConfig } from '../providers/openai-provider';
import { AnthropicDefaultConfig } from '../providers/anthropic-provider';
import { EmbeddingDefaultConfig } from '../providers/embedding-provider';

// Anthropic configuration schema
const ANTHROPIC_CONFIG_SCHEMA = z.object({
  ANTHROPIC_API_KEY: z.string().min(1),
  ANTHROPIC_MODEL: z.string().default(AnthropicDefaultConfig.model),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(AnthropicDefaultConfig.maxTokens),
  ANTHROPIC_TEMPERATURE: z.coerce.number().min(0).max(1).optional(),
});

// OpenAI configuration schema
const OPENAI_CONFIG_SCHEMA = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().default(OpenAIDefaultConfig.model),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
});

// Retrieval embeddings, shared by both chat providers
const EMBEDDING_CONFIG_SCHEMA = z.object({
  EMBEDDING_API_KEY: z.string().min(1).optional(),
  EMBEDDING_MODEL: z.string().default(EmbeddingDefaultConfig.model),
});

// Optional token pricing, used for the cost line in verbose output
const PRICING_CONFIG_SCHEMA = z.object({
  INPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
  OUTPUT_PRICE_PER_MILLION: z.coerce.number().nonnegative().optional(),
});

// Discriminated union based on provider type
export const ENV_SCHEMA = z.discriminatedUnion('LLM_PROVIDER', [
  z.object({ LLM_PROVIDER: z.literal(ProviderType.Anthropic) })
    .merge(ANTHROPIC_CONFIG_SCHEMA)
    .merge(EMBEDDING_CONFIG_SCHEMA)
    .merge(PRICING_CONFIG_SCHEMA),
  z.object({ LLM_PROVIDER: z.literal(ProviderType.OpenAI) })
    .merge(OPENAI_CONFIG_SCHEMA)
    .merge(EMBEDDING_CONFIG_SCHEMA)
    .merge(PRICING_CONFIG_SCHEMA),
]);

// No LLM_PROVIDER means openai
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data === 'object' && data !== null && !('LLM_PROVIDER' in data)) {
      return { ...data, LLM_PROVIDER: ProviderType.OpenAI };
    }
    return data;
  },
  ENV_SCHEMA
);

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
export type AnthropicEnvConfig = z.infer<typeof ANTHROPIC_CONFIG_SCHEMA>;
export type OpenAIEnvConfig = z.infer<typeof OPENAI_CONFIG_SCHEMA>;
