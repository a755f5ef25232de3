import { z } from 'zod';
import { APIResponseError, SchemaValidationError } from '../errors/validation-errors';
import type { StructuredSchema } from './llm-provider';

export interface DebugOptions {
  debug?: boolean;
  showPrompt?: boolean;
  showPromptTrunc?: boolean;
  debugJson?: boolean;
}

const PREVIEW_CHARS = 500;

/**
 * Parses a raw provider payload against its wire schema, mapping zod failures
 * to APIResponseError.
 */
export function parseApiResponse<T>(
  wireSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  response: unknown,
  providerName: string
): T {
  const result = wireSchema.safeParse(response);
  if (!result.success) {
    throw new APIResponseError(
      `Invalid ${providerName} API response structure: ${result.error.message}`,
      response,
      result.error
    );
  }
  return result.data;
}

export function validateStructured<T>(schema: StructuredSchema<T>, data: unknown): T {
  const result = schema.schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SchemaValidationError(issues, schema.name, data, result.error);
  }
  return result.data;
}

export function logPrompt(
  options: DebugOptions,
  systemPrompt: string,
  content: string,
  print: (message: string) => void
): void {
  if (!options.debug) return;
  if (options.showPrompt) {
    print('System prompt (full):');
    print(systemPrompt);
    print('User content (full):');
    print(content);
  } else if (options.showPromptTrunc) {
    print(`System prompt (first ${PREVIEW_CHARS} chars):`);
    print(systemPrompt.slice(0, PREVIEW_CHARS));
    if (systemPrompt.length > PREVIEW_CHARS) print('... [truncated]');
    print(`User content preview (first ${PREVIEW_CHARS} chars):`);
    print(content.slice(0, PREVIEW_CHARS));
    if (content.length > PREVIEW_CHARS) print('... [truncated]');
  }
}
