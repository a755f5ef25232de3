import { normalizeDomain } from '../corroboration/domain';
import type { CandidateRef } from '../corroboration/types';
import type { EmbeddingProvider } from '../providers/embedding-provider';
import type { EmbeddedChunkRow } from '../schemas/evidence-schemas';
import { ProcessingError } from '../errors/index';
import { warn } from '../output/logger';
import type { CandidateRetriever, RetrievalRequest } from './retriever';

export const DEFAULT_MIN_SIMILARITY = 0.2;

export interface ScoredChunk {
  chunkId: string;
  domain: string;
  similarity: number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new ProcessingError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Picks up to `k` chunks from a similarity-ordered list, one per domain
 * first, then fills the remaining slots in list order.
 */
export function greedyDiverseTopK<T extends { domain: string }>(ordered: readonly T[], k: number): T[] {
  const picked: T[] = [];
  const pickedSet = new Set<T>();
  const seenDomains = new Set<string>();
  for (const item of ordered) {
    if (picked.length >= k) break;
    if (seenDomains.has(item.domain)) continue;
    picked.push(item);
    pickedSet.add(item);
    seenDomains.add(item.domain);
  }
  for (const item of ordered) {
    if (picked.length >= k) break;
    if (pickedSet.has(item)) continue;
    picked.push(item);
    pickedSet.add(item);
  }
  return picked;
}

export interface EmbeddingRetrieverOptions {
  minSimilarity?: number;
}

/**
 * Semantic retrieval over pre-embedded chunks. The query is embedded once
 * per request; chunks below `minSimilarity` are dropped.
 */
export class EmbeddingRetriever implements CandidateRetriever {
  private readonly minSimilarity: number;

  constructor(
    private readonly rows: readonly EmbeddedChunkRow[],
    private readonly embeddings: EmbeddingProvider,
    options: EmbeddingRetrieverOptions = {}
  ) {
    this.minSimilarity = options.minSimilarity ?? DEFAULT_MIN_SIMILARITY;
  }

  async retrieve(request: RetrievalRequest): Promise<CandidateRef[]> {
    const personRows = this.rows.filter((row) => row.person_name === request.personName);
    if (personRows.length === 0) return [];

    const [queryVector] = await this.embeddings.embed(
      [request.query],
      request.signal ? { signal: request.signal } : {}
    );
    if (!queryVector) {
      throw new ProcessingError(`No embedding returned for query: ${request.query}`);
    }

    const scored: ScoredChunk[] = [];
    for (const row of personRows) {
      if (row.embedding.length !== queryVector.length) {
        warn(`Chunk ${row.chunk_id} has ${row.embedding.length} dimensions, query has ${queryVector.length}; skipped`);
        continue;
      }
      const similarity = cosineSimilarity(queryVector, row.embedding);
      if (similarity < this.minSimilarity) continue;
      scored.push({ chunkId: row.chunk_id, domain: normalizeDomain(row.source_url), similarity });
    }

    scored.sort((a, b) => b.similarity - a.similarity);
    return greedyDiverseTopK(scored, request.topN).map((chunk, i) => ({
      chunkId: chunk.chunkId,
      rank: i + 1,
    }));
  }
}
