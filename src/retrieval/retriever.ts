import type { Attribute, CandidateRef } from '../corroboration/types';
import type { CandidateRow } from '../schemas/evidence-schemas';

export interface RetrievalRequest {
  personName: string;
  attribute: Attribute;
  /** Rendered retrieval query for the attribute. */
  query: string;
  topN: number;
  signal?: AbortSignal;
}

/*
 * Produces the rank-ordered chunk references one scan consumes.
 */
export interface CandidateRetriever {
  retrieve(request: RetrievalRequest): Promise<CandidateRef[]>;
}

/**
 * Serves a precomputed candidate list. Rows without an attribute apply to
 * every attribute. Equal ranks keep file order.
 */
export class RankedListRetriever implements CandidateRetriever {
  constructor(private readonly rows: readonly CandidateRow[]) {}

  retrieve(request: RetrievalRequest): Promise<CandidateRef[]> {
    const refs = this.rows
      .filter(
        (row) =>
          row.person_name === request.personName &&
          (row.attribute === undefined || row.attribute === request.attribute)
      )
      .map((row) => ({ chunkId: row.chunk_id, rank: row.rank }))
      .sort((a, b) => a.rank - b.rank)
      .slice(0, request.topN);
    return Promise.resolve(refs);
  }
}
