import type { EvidenceVocabulary } from '../evidence-classifier';
import type { Attribute, ClaimShape, EvidenceRecord, ScanStats, VerificationResult } from '../types';

/*
 * Accumulates accepted claims for one scan. Created fresh per scan.
 */
export interface ClaimTally<V> {
  record(value: V, evidence: EvidenceRecord): void;
  /** True once some single value is backed by QUORUM distinct domains. */
  quorumReached(): boolean;
}

/*
 * Everything that varies between attributes: how claims are tallied,
 * whether a quorum ends the scan, and how the tally becomes a result.
 */
export interface ShapeStrategy<V, T extends ClaimTally<V>, R extends VerificationResult> {
  readonly attribute: Attribute;
  readonly shape: ClaimShape;
  readonly vocabulary: EvidenceVocabulary;
  readonly stopsOnQuorum: boolean;
  createTally(): T;
  describe(value: V): string;
  resolve(personName: string, tally: T, stats: ScanStats): R;
}
