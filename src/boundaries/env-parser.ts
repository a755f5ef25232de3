import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ProviderType } from '../providers/provider-factory';
import { ValidationError, handleUnknownError } from '../errors/index';
import type { PricingConfig } from '../types/token-usage';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      // Zod error - provide specific error messages for missing provider-specific variables
      const errorMessage = formatProviderValidationError(e, env);
      throw new ValidationError(`Invalid environment variables: ${errorMessage}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

export function pricingFromEnv(env: EnvConfig): PricingConfig {
  return {
    inputPricePerMillion: env.INPUT_PRICE_PER_MILLION,
    outputPricePerMillion: env.OUTPUT_PRICE_PER_MILLION,
  };
}

function readProvider(env: unknown): string | undefined {
  if (typeof env !== 'object' || env === null || !('LLM_PROVIDER' in env)) return undefined;
  const value: unknown = env.LLM_PROVIDER;
  return typeof value === 'string' ? value : undefined;
}

function formatProviderValidationError(zodError: z.ZodError, env: unknown): string {
  const issues = zodError.issues;
  const providerType = readProvider(env) ?? ProviderType.OpenAI;

  const discriminatorIssue = issues.find(
    (issue) =>
      issue.code === z.ZodIssueCode.invalid_union_discriminator ||
      (issue.path.length === 1 && issue.path[0] === 'LLM_PROVIDER')
  );
  if (discriminatorIssue) {
    return `LLM_PROVIDER must be either '${ProviderType.OpenAI}' or '${ProviderType.Anthropic}'. Received: ${providerType}`;
  }

  const missingFields = issues
    .filter((issue) => issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined')
    .map((issue) => issue.path.join('.'));

  if (missingFields.length > 0) {
    if (providerType === ProviderType.Anthropic) {
      const anthropicFields = missingFields.filter((field) => field.startsWith('ANTHROPIC_'));
      if (anthropicFields.length > 0) {
        return `Missing required Anthropic environment variables: ${anthropicFields.join(', ')}. When using LLM_PROVIDER=anthropic, ensure ANTHROPIC_API_KEY is set.`;
      }
    }

    if (providerType === ProviderType.OpenAI) {
      const openaiFields = missingFields.filter((field) => field.startsWith('OPENAI_'));
      if (openaiFields.length > 0) {
        return `Missing required OpenAI environment variables: ${openaiFields.join(', ')}. When using LLM_PROVIDER=openai (the default), ensure OPENAI_API_KEY is set.`;
      }
    }
  }

  const fieldErrors = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
}
