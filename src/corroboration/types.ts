/** Number of distinct-domain sources needed to call a value verified. */
export const QUORUM = 2;

export const DEFAULT_MAX_SCANS = 10;

export enum Attribute {
  BirthYear = 'birth-year',
  LifeStatus = 'life-status',
  Nationality = 'nationality',
}

export type ClaimShape = 'scalar-exclusive' | 'categorical-exclusive' | 'set-inclusive';

export type Claim<V> =
  | { present: false; reason?: string }
  | { present: true; value: V };

export type LifeStatusClaim =
  | { status: 'deceased'; year: number }
  | { status: 'alive' };

export type StopPolicy = 'quorum' | 'exhaustive';

export type StopReason =
  | 'quorum_reached'
  | 'budget_exhausted'
  | 'candidates_exhausted'
  | 'no_candidates';

export type Outcome =
  | 'verified'
  | 'conflict_resolved'
  | 'no_corroboration'
  | 'conflict_inconclusive'
  | 'partial'
  | 'no_evidence';

export type VerifiedLevel = 0 | 1 | 2;

/*
 * A chunk reference as handed over by a retriever, before it is resolved
 * against the chunk index.
 */
export interface CandidateRef {
  chunkId: string;
  rank: number;
}

export interface EvidenceCandidate {
  readonly chunkId: string;
  readonly domain: string;
  readonly url: string;
  readonly chunkIndex: number | null;
  readonly rank: number;
  readonly text: string;
}

export interface EvidenceRecord {
  readonly url: string;
  readonly chunkIndex: number | null;
  readonly domain: string;
  readonly evidenceType: string;
  readonly qualityRank: number;
  readonly authority: string;
}

export interface ValueTally<V> {
  value: V;
  count: number;
  sampleSource: EvidenceRecord | null;
}

export interface ScanStats {
  scannedCount: number;
  skippedCount: number;
  extractorFailures: number;
  absentClaims: number;
  stopReason: StopReason;
}

interface BaseResult extends ScanStats {
  personName: string;
  verifiedLevel: VerifiedLevel;
  outcome: Outcome;
  error?: string;
}

export interface BirthYearResult extends BaseResult {
  attribute: Attribute.BirthYear;
  birthYear: number | null;
  winnerSources: EvidenceRecord[];
  runnerUps: ValueTally<number>[];
}

export type LifeStatus = 'deceased' | 'alive' | 'unknown';

export interface LifeStatusResult extends BaseResult {
  attribute: Attribute.LifeStatus;
  status: LifeStatus;
  deathYear: number | null;
  winnerSources: EvidenceRecord[];
  aliveSignals: EvidenceRecord[];
  runnerUps: ValueTally<number>[];
}

export interface NationalityDetail {
  count: number;
  sources: EvidenceRecord[];
}

export interface NationalityResult extends BaseResult {
  attribute: Attribute.Nationality;
  nationalities: string[];
  unverifiedNationalities: string[];
  details: Record<string, NationalityDetail>;
}

export type VerificationResult = BirthYearResult | LifeStatusResult | NationalityResult;

/** A chunk as stored in the chunk index. */
export interface ChunkRecord {
  chunkId: string;
  personName: string;
  sourceUrl: string;
  chunkIndex: number | null;
  text: string;
}

export interface ChunkLookup {
  get(chunkId: string): ChunkRecord | undefined;
}
