import type { z } from 'zod';
import type { TokenUsage } from '../types/token-usage';

export interface LLMResult<T> {
  data: T;
  usage?: TokenUsage;
}

/*
 * Named response schema. Providers send its JSON Schema form to the model
 * and validate the answer against it before returning.
 */
export interface StructuredSchema<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface LLMProvider {
  runPromptStructured<T>(
    content: string,
    promptText: string,
    schema: StructuredSchema<T>,
    options?: RequestOptions
  ): Promise<LLMResult<T>>;
}
