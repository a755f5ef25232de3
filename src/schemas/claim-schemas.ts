import { z } from 'zod';

// Structured answers the extraction prompts ask the model for

export const BIRTH_RESPONSE_SCHEMA = z.object({
  reasoning: z.string(),
  contains_birthdate: z.boolean(),
  birth_year: z.number().int().nullable(),
});

export const LIFE_STATUS_RESPONSE_SCHEMA = z.object({
  reasoning: z.string(),
  status: z.enum(['deceased', 'alive', 'unknown']),
  death_year: z.number().int().nullable(),
});

export const NATIONALITY_RESPONSE_SCHEMA = z.object({
  reasoning: z.string(),
  nationalities_found: z.boolean(),
  nationalities: z.array(z.string()),
});

// Inferred types
export type BirthResponse = z.infer<typeof BIRTH_RESPONSE_SCHEMA>;
export type LifeStatusResponse = z.infer<typeof LIFE_STATUS_RESPONSE_SCHEMA>;
export type NationalityResponse = z.infer<typeof NATIONALITY_RESPONSE_SCHEMA>;
