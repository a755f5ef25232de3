import { z } from 'zod';
import { Attribute } from '../corroboration/types';

// One entry of the chunk index JSON array
export const CHUNK_ROW_SCHEMA = z.object({
  chunk_id: z.string().min(1),
  person_name: z.string().min(1),
  source_url: z.string(),
  chunk_index: z.number().int().nonnegative().nullable().optional(),
  text: z.string(),
});

export const CHUNK_FILE_SCHEMA = z.array(CHUNK_ROW_SCHEMA);

// One line of a precomputed candidates JSONL file
export const CANDIDATE_ROW_SCHEMA = z.object({
  person_name: z.string().min(1),
  chunk_id: z.string().min(1),
  attribute: z.nativeEnum(Attribute).optional(),
  rank: z.number(),
});

// One line of an embedded chunks JSONL file
export const EMBEDDED_CHUNK_ROW_SCHEMA = z.object({
  chunk_id: z.string().min(1),
  person_name: z.string().min(1),
  source_url: z.string(),
  embedding: z.array(z.number()).min(1),
});

export type ChunkRow = z.infer<typeof CHUNK_ROW_SCHEMA>;
export type CandidateRow = z.infer<typeof CANDIDATE_ROW_SCHEMA>;
export type EmbeddedChunkRow = z.infer<typeof EMBEDDED_CHUNK_ROW_SCHEMA>;
