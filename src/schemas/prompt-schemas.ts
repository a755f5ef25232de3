import { z } from 'zod';
import { Attribute } from '../corroboration/types';

// Extraction prompt metadata from YAML frontmatter
export const PROMPT_META_SCHEMA = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  attribute: z.nativeEnum(Attribute),
  // Retrieval query template, e.g. "date of birth of {{person_name}}"
  query: z.string().min(1),
});

export const PROMPT_FILE_SCHEMA = z.object({
  id: z.string(),
  filename: z.string(),
  fullPath: z.string(),
  meta: PROMPT_META_SCHEMA,
  body: z.string(),
});

// Inferred types
export type PromptMeta = z.infer<typeof PROMPT_META_SCHEMA>;
export type PromptFile = z.infer<typeof PROMPT_FILE_SCHEMA>;
