import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

// Options of the verify command
export const VERIFY_OPTIONS_SCHEMA = z.object({
  person: z.array(z.string().min(1)).optional(),
  maxScans: positiveInt.optional(),
  topN: positiveInt.optional(),
  stopPolicy: z.enum(['quorum', 'exhaustive']).optional(),
  concurrency: positiveInt.optional(),
  timeout: positiveInt.optional(),
  output: z.enum(['line', 'json']).default('line'),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
  showPrompt: z.boolean().default(false),
  showPromptTrunc: z.boolean().default(false),
  debugJson: z.boolean().default(false),
});

// Options of the aggregate command
export const AGGREGATE_OPTIONS_SCHEMA = z.object({
  prefix: z.string().min(1).default('people'),
  outputDir: z.string().optional(),
  config: z.string().optional(),
});

// Inferred types
export type VerifyOptions = z.infer<typeof VERIFY_OPTIONS_SCHEMA>;
export type AggregateOptions = z.infer<typeof AGGREGATE_OPTIONS_SCHEMA>;
