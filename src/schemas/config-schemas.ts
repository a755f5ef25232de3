import { z } from 'zod';

// Configuration file schema for .factledger.ini validation
export const CONFIG_SCHEMA = z.object({
  chunksPath: z.string().min(1),
  candidatesPath: z.string().min(1).optional(),
  embeddingsPath: z.string().min(1).optional(),
  outputDir: z.string().min(1),
  promptsPath: z.string().min(1),
  concurrency: z.number().int().positive().default(4),
  maxScans: z.number().int().positive().default(10),
  topN: z.number().int().positive().default(10),
  extractorTimeoutMs: z.number().int().positive().default(30_000),
  stopPolicy: z.enum(['quorum', 'exhaustive']).default('quorum'),
  minSimilarity: z.number().min(-1).max(1).default(0.2),
  configDir: z.string().min(1),
});

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
