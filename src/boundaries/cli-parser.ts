import { z } from 'zod';
import {
  AGGREGATE_OPTIONS_SCHEMA,
  VERIFY_OPTIONS_SCHEMA,
  type AggregateOptions,
  type VerifyOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'options'}: ${issue.message}`)
    .join('; ');
}

export function parseVerifyOptions(raw: unknown): VerifyOptions {
  try {
    return VERIFY_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid verify options: ${formatIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'Verify option parsing');
    throw new ValidationError(`Verify option parsing failed: ${err.message}`, e);
  }
}

export function parseAggregateOptions(raw: unknown): AggregateOptions {
  try {
    return AGGREGATE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid aggregate options: ${formatIssues(e)}`, e);
    }
    const err = handleUnknownError(e, 'Aggregate option parsing');
    throw new ValidationError(`Aggregate option parsing failed: ${err.message}`, e);
  }
}
