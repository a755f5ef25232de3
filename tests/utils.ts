import { ChunkIndex } from '../src/boundaries/chunk-store';
import type { ClaimExtractor, ExtractionRequest } from '../src/corroboration/claim-extractor';
import type { CandidateRef, Claim, EvidenceRecord } from '../src/corroboration/types';

export const PERSON = 'Ada Example';

/** What a scripted extractor does for one chunk text. */
export type ScriptedStep<V> = Claim<V> | Error | 'hang';

/*
 * Deterministic extractor keyed by chunk text. Unscripted texts yield an
 * absent claim; 'hang' never settles until the call's signal aborts.
 */
export class ScriptedExtractor<V> implements ClaimExtractor<V> {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, ScriptedStep<V>>) {}

  extract(request: ExtractionRequest): Promise<Claim<V>> {
    this.calls.push(request.text);
    const step = this.script[request.text];
    if (step === undefined) {
      return Promise.resolve({ present: false, reason: 'unscripted' });
    }
    if (step === 'hang') {
      return new Promise<Claim<V>>((_resolve, reject) => {
        request.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    if (step instanceof Error) {
      return Promise.reject(step);
    }
    return Promise.resolve(step);
  }
}

export function present<V>(value: V): Claim<V> {
  return { present: true, value };
}

export const ABSENT: Claim<never> = { present: false, reason: 'nothing stated' };

/** Chunk index for PERSON from [chunkId, url, text] triples; chunk_index is the position. */
export function chunkIndexOf(rows: Array<[string, string, string]>, personName: string = PERSON): ChunkIndex {
  return new ChunkIndex(
    rows.map(([chunkId, url, text], i) => ({
      chunk_id: chunkId,
      person_name: personName,
      source_url: url,
      chunk_index: i,
      text,
    }))
  );
}

export function refsOf(chunkIds: string[]): CandidateRef[] {
  return chunkIds.map((chunkId, i) => ({ chunkId, rank: i + 1 }));
}

export function evidence(domain: string, qualityRank: number = 2, evidenceType: string = 'other'): EvidenceRecord {
  return {
    url: `https://${domain}/page`,
    chunkIndex: 0,
    domain,
    evidenceType,
    qualityRank,
    authority: 'other',
  };
}
