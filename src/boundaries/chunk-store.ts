import { readFileSync } from 'fs';
import { z } from 'zod';
import type { ChunkLookup, ChunkRecord } from '../corroboration/types';
import { CHUNK_FILE_SCHEMA, type ChunkRow } from '../schemas/evidence-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';

/*
 * In-memory chunk index keyed by chunk id. A later row with the same id
 * replaces the earlier one.
 */
export class ChunkIndex implements ChunkLookup {
  private readonly byId = new Map<string, ChunkRecord>();
  private readonly people: string[] = [];

  constructor(rows: readonly ChunkRow[]) {
    const seen = new Set<string>();
    for (const row of rows) {
      this.byId.set(row.chunk_id, {
        chunkId: row.chunk_id,
        personName: row.person_name,
        sourceUrl: row.source_url,
        chunkIndex: row.chunk_index ?? null,
        text: row.text,
      });
      if (!seen.has(row.person_name)) {
        seen.add(row.person_name);
        this.people.push(row.person_name);
      }
    }
  }

  get(chunkId: string): ChunkRecord | undefined {
    return this.byId.get(chunkId);
  }

  get size(): number {
    return this.byId.size;
  }

  /** Person names in the order they first appear. */
  personNames(): string[] {
    return [...this.people];
  }
}

export function loadChunkIndex(filePath: string): ChunkIndex {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Loading chunk index');
    throw new ConfigError(`Failed to load chunk index ${filePath}: ${err.message}`);
  }
  try {
    return new ChunkIndex(CHUNK_FILE_SCHEMA.parse(parsed));
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const first = e.issues[0];
      const where = first ? `${first.path.join('.')}: ${first.message}` : e.message;
      throw new ValidationError(`Invalid chunk index ${filePath}: ${where}`, e);
    }
    throw e;
  }
}
