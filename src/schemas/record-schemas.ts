import { z } from 'zod';

/*
 * Result records as read back from the per-attribute JSONL files. Only the
 * fields aggregation needs are declared; the rest pass through.
 */

export const SOURCE_RECORD_SCHEMA = z.object({
  url: z.string(),
  chunk_index: z.number().nullable(),
  domain: z.string(),
  evidence_type: z.string(),
  quality_rank: z.number(),
  authority: z.string(),
});

const BASE_RECORD_SCHEMA = z.object({
  person_name: z.string().min(1),
  verified_level: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  outcome: z.string(),
});

export const BIRTH_YEAR_RECORD_SCHEMA = BASE_RECORD_SCHEMA.extend({
  birth_year: z.number().nullable(),
  winner_sources: z.array(SOURCE_RECORD_SCHEMA),
}).passthrough();

export const LIFE_STATUS_RECORD_SCHEMA = BASE_RECORD_SCHEMA.extend({
  status: z.enum(['deceased', 'alive', 'unknown']),
  death_year: z.number().nullable(),
  death_year_sources: z.array(SOURCE_RECORD_SCHEMA),
  alive_signals: z.array(SOURCE_RECORD_SCHEMA),
}).passthrough();

export const NATIONALITY_RECORD_SCHEMA = BASE_RECORD_SCHEMA.extend({
  nationalities: z.array(z.string()),
  nationality_details: z.record(
    z.string(),
    z.object({
      count: z.number(),
      sources: z.array(SOURCE_RECORD_SCHEMA),
    })
  ),
}).passthrough();

export type SourceRecord = z.infer<typeof SOURCE_RECORD_SCHEMA>;
export type BirthYearRecord = z.infer<typeof BIRTH_YEAR_RECORD_SCHEMA>;
export type LifeStatusRecord = z.infer<typeof LIFE_STATUS_RECORD_SCHEMA>;
export type NationalityRecord = z.infer<typeof NATIONALITY_RECORD_SCHEMA>;
