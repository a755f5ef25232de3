import { ScanCancelledError } from '../errors/index';
import { debug, warn } from '../output/logger';
import { extractWithTimeout, type ClaimExtractor } from './claim-extractor';
import { normalizeDomain } from './domain';
import { authorityBucket, classifyEvidence } from './evidence-classifier';
import { ScanController } from './scan-controller';
import type { ClaimTally, ShapeStrategy } from './shapes/shape';
import {
  DEFAULT_MAX_SCANS,
  type CandidateRef,
  type ChunkLookup,
  type EvidenceCandidate,
  type EvidenceRecord,
  type ScanStats,
  type StopPolicy,
  type VerificationResult,
} from './types';

export const DEFAULT_EXTRACTOR_TIMEOUT_MS = 30_000;

export interface ScanOptions {
  maxScans?: number;
  stopPolicy?: StopPolicy;
  extractorTimeoutMs?: number;
  /** Aborting cancels the scan; no result is produced. */
  signal?: AbortSignal;
  verbose?: boolean;
}

export interface ScanInput<V> {
  personName: string;
  /** Rank-ordered, as produced by the retriever. */
  candidates: readonly CandidateRef[];
  chunks: ChunkLookup;
  extractor: ClaimExtractor<V>;
}

export type ResolvedCandidate =
  | { kind: 'ok'; candidate: EvidenceCandidate }
  | { kind: 'missing' }
  | { kind: 'foreign'; owner: string };

/** Looks up a ref's chunk; a chunk belonging to someone else is not evidence for `personName`. */
export function resolveCandidate(ref: CandidateRef, chunks: ChunkLookup, personName: string): ResolvedCandidate {
  const row = chunks.get(ref.chunkId);
  if (!row) return { kind: 'missing' };
  if (row.personName !== personName) return { kind: 'foreign', owner: row.personName };
  return {
    kind: 'ok',
    candidate: {
      chunkId: ref.chunkId,
      domain: normalizeDomain(row.sourceUrl),
      url: row.sourceUrl,
      chunkIndex: row.chunkIndex,
      rank: ref.rank,
      text: row.text,
    },
  };
}

function throwIfCancelled(signal: AbortSignal | undefined, personName: string): void {
  if (signal?.aborted) {
    throw new ScanCancelledError(personName);
  }
}

/**
 * Scans candidates in rank order, tallying claims until the early-stop
 * controller halts, then resolves the tally through the claim shape.
 *
 * Steps are strictly sequential: whether to scan chunk n+1 depends on the
 * ledger after chunk n. Chunks missing from the index, or filed under another
 * person, are skipped without consuming budget. Extractor failures and
 * timeouts count as absent claims.
 *
 * @throws ScanCancelledError when `options.signal` aborts mid-scan
 */
export async function runScan<V, T extends ClaimTally<V>, R extends VerificationResult>(
  shape: ShapeStrategy<V, T, R>,
  input: ScanInput<V>,
  options: ScanOptions = {}
): Promise<R> {
  const { personName, candidates, chunks, extractor } = input;
  const maxScans = options.maxScans ?? DEFAULT_MAX_SCANS;
  const timeoutMs = options.extractorTimeoutMs ?? DEFAULT_EXTRACTOR_TIMEOUT_MS;
  const stopPolicy = options.stopPolicy ?? 'quorum';
  const { signal, verbose } = options;

  const controller = new ScanController({
    maxScans,
    stopOnQuorum: shape.stopsOnQuorum && stopPolicy === 'quorum',
  });
  const tally = shape.createTally();
  let skippedCount = 0;
  let extractorFailures = 0;
  let absentClaims = 0;

  for (const ref of candidates) {
    throwIfCancelled(signal, personName);

    const resolved = resolveCandidate(ref, chunks, personName);
    if (resolved.kind === 'missing') {
      skippedCount += 1;
      warn(`Chunk ${ref.chunkId} (rank ${ref.rank}) is missing from the chunk index; skipped for ${personName}`);
      continue;
    }
    if (resolved.kind === 'foreign') {
      skippedCount += 1;
      warn(`Chunk ${ref.chunkId} (rank ${ref.rank}) belongs to ${resolved.owner}; skipped for ${personName}`);
      continue;
    }
    const { candidate } = resolved;

    const step = `[${controller.scannedCount + 1}/${maxScans}] ${candidate.domain}  ${candidate.url}`;
    const extraction = await extractWithTimeout(
      extractor,
      candidate.chunkId,
      { personName, text: candidate.text },
      timeoutMs,
      signal
    );
    throwIfCancelled(signal, personName);

    if (!extraction.ok) {
      extractorFailures += 1;
      warn(`${step} -> extractor failed: ${extraction.error.message}`);
    } else if (!extraction.claim.present) {
      absentClaims += 1;
      debug(verbose, `${step} -> ${extraction.claim.reason ?? 'no claim'}`);
    } else {
      const { evidenceType, qualityRank } = classifyEvidence(shape.vocabulary, candidate.text);
      const evidence: EvidenceRecord = {
        url: candidate.url,
        chunkIndex: candidate.chunkIndex,
        domain: candidate.domain,
        evidenceType,
        qualityRank,
        authority: authorityBucket(candidate.domain),
      };
      tally.record(extraction.claim.value, evidence);
      debug(verbose, `${step} -> ${shape.describe(extraction.claim.value)} (${evidenceType})`);
    }

    const state = controller.observe(tally.quorumReached());
    if (state.kind === 'stopped') break;
  }

  const current = controller.current;
  const finalState = current.kind === 'stopped' ? current : controller.exhaust();
  const stats: ScanStats = {
    scannedCount: controller.scannedCount,
    skippedCount,
    extractorFailures,
    absentClaims,
    stopReason: finalState.reason,
  };
  return shape.resolve(personName, tally, stats);
}
