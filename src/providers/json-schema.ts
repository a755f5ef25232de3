import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ValidationError } from '../errors/index';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/*
 * Inline JSON Schema for a zod schema, without the $schema marker that
 * provider APIs reject.
 */
export function toJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const converted: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(converted)) {
    throw new ValidationError('Response schema did not convert to a JSON object schema');
  }
  const { $schema: _ignored, ...rest } = converted;
  return rest;
}
