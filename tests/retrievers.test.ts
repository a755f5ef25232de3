import { describe, it, expect, vi } from 'vitest';
import { RankedListRetriever } from '../src/retrieval/retriever';
import { EmbeddingRetriever, cosineSimilarity, greedyDiverseTopK } from '../src/retrieval/embedding-retriever';
import type { EmbeddingProvider } from '../src/providers/embedding-provider';
import type { RequestOptions } from '../src/providers/llm-provider';
import { Attribute } from '../src/corroboration/types';
import { ProcessingError } from '../src/errors/index';
import { PERSON } from './utils';

class FixedEmbeddings implements EmbeddingProvider {
  readonly queries: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(private readonly vector: number[]) {}

  embed(texts: string[], options?: RequestOptions): Promise<number[][]> {
    this.queries.push(...texts);
    this.signals.push(options?.signal);
    return Promise.resolve(texts.map(() => this.vector));
  }
}

const request = {
  personName: PERSON,
  attribute: Attribute.BirthYear,
  query: `date of birth of ${PERSON}`,
  topN: 10,
};

describe('RankedListRetriever', () => {
  const retriever = new RankedListRetriever([
    { person_name: PERSON, chunk_id: 'c3', rank: 3 },
    { person_name: PERSON, chunk_id: 'c1', rank: 1, attribute: Attribute.BirthYear },
    { person_name: PERSON, chunk_id: 'n1', rank: 0, attribute: Attribute.Nationality },
    { person_name: 'Bo Sample', chunk_id: 'x1', rank: 1 },
    { person_name: PERSON, chunk_id: 'c2', rank: 2 },
  ]);

  it('keeps the person and attribute rows in rank order', async () => {
    await expect(retriever.retrieve(request)).resolves.toEqual([
      { chunkId: 'c1', rank: 1 },
      { chunkId: 'c2', rank: 2 },
      { chunkId: 'c3', rank: 3 },
    ]);
  });

  it('applies topN after sorting', async () => {
    const refs = await retriever.retrieve({ ...request, attribute: Attribute.Nationality, topN: 2 });
    expect(refs).toEqual([
      { chunkId: 'n1', rank: 0 },
      { chunkId: 'c2', rank: 2 },
    ]);
  });
});

describe('cosineSimilarity', () => {
  it('scores parallel, orthogonal and zero vectors', () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('throws on a dimension mismatch', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(ProcessingError);
  });
});

describe('greedyDiverseTopK', () => {
  const items = [
    { id: 1, domain: 'a.org' },
    { id: 2, domain: 'a.org' },
    { id: 3, domain: 'b.org' },
    { id: 4, domain: 'c.org' },
  ];

  it('takes one per domain before repeating', () => {
    expect(greedyDiverseTopK(items, 3).map((i) => i.id)).toEqual([1, 3, 4]);
  });

  it('fills from the ordered list once domains run out', () => {
    expect(greedyDiverseTopK(items, 4).map((i) => i.id)).toEqual([1, 3, 4, 2]);
    expect(greedyDiverseTopK(items, 10)).toHaveLength(4);
  });
});

describe('EmbeddingRetriever', () => {
  const rows = [
    { chunk_id: 'a1', person_name: PERSON, source_url: 'https://www.a.org/1', embedding: [1, 0] },
    { chunk_id: 'a2', person_name: PERSON, source_url: 'https://a.org/2', embedding: [0.9, 0.1] },
    { chunk_id: 'b1', person_name: PERSON, source_url: 'https://b.org/1', embedding: [0.6, 0.8] },
    { chunk_id: 'low', person_name: PERSON, source_url: 'https://c.org/1', embedding: [0, 1] },
    { chunk_id: 'bad', person_name: PERSON, source_url: 'https://d.org/1', embedding: [1, 0, 0] },
    { chunk_id: 'other', person_name: 'Bo Sample', source_url: 'https://e.org/1', embedding: [1, 0] },
  ];

  it('ranks by similarity with domain diversity', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const embeddings = new FixedEmbeddings([1, 0]);
    const retriever = new EmbeddingRetriever(rows, embeddings);

    const refs = await retriever.retrieve(request);

    expect(refs).toEqual([
      { chunkId: 'a1', rank: 1 },
      { chunkId: 'b1', rank: 2 },
      { chunkId: 'a2', rank: 3 },
    ]);
    expect(embeddings.queries).toEqual([`date of birth of ${PERSON}`]);
    expect(warnSpy).toHaveBeenCalledWith('[factledger] Warning: Chunk bad has 3 dimensions, query has 2; skipped');
  });

  it('honours topN and minSimilarity', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const retriever = new EmbeddingRetriever(rows, new FixedEmbeddings([1, 0]), { minSimilarity: 0.7 });

    await expect(retriever.retrieve({ ...request, topN: 1 })).resolves.toEqual([{ chunkId: 'a1', rank: 1 }]);
    await expect(retriever.retrieve(request)).resolves.toEqual([
      { chunkId: 'a1', rank: 1 },
      { chunkId: 'a2', rank: 2 },
    ]);
  });

  it('skips the embedding call for an unknown person', async () => {
    const embeddings = new FixedEmbeddings([1, 0]);
    const retriever = new EmbeddingRetriever(rows, embeddings);

    await expect(retriever.retrieve({ ...request, personName: 'Nobody' })).resolves.toEqual([]);
    expect(embeddings.queries).toEqual([]);
  });

  it('passes the abort signal to the embedding call', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const embeddings = new FixedEmbeddings([1, 0]);
    const controller = new AbortController();

    await new EmbeddingRetriever(rows, embeddings).retrieve({ ...request, signal: controller.signal });

    expect(embeddings.signals).toEqual([controller.signal]);
  });
});
