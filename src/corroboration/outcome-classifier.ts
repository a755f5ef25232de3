import type { Ledger } from './ledger';
import { QUORUM, type Outcome, type VerifiedLevel } from './types';

export interface ExclusiveVerdict<V> {
  winner: V | null;
  outcome: Outcome;
  verifiedLevel: VerifiedLevel;
}

export interface SetVerdict<V> {
  verified: V[];
  unverified: V[];
  outcome: Outcome;
  verifiedLevel: VerifiedLevel;
}

/*
 * Among tied values, the one whose best (lowest) quality rank is lowest.
 * Equal best ranks go to the value recorded first in scan order.
 */
export function pickByQuality<V>(ledger: Ledger<V>, tied: readonly V[]): V | null {
  let best: V | null = null;
  let bestRank = Number.POSITIVE_INFINITY;
  for (const value of tied) {
    const sources = ledger.entry(value)?.sources ?? [];
    const rank = Math.min(...sources.map((s) => s.qualityRank));
    if (best === null || rank < bestRank) {
      best = value;
      bestRank = rank;
    }
  }
  return best;
}

/**
 * Resolves a scalar- or categorical-exclusive ledger into one value.
 *
 * | max count | top values | outcome               | level |
 * |-----------|------------|-----------------------|-------|
 * | 0         | -          | no_evidence           | 0     |
 * | >= 2      | 1          | verified              | 2     |
 * | >= 2      | > 1        | conflict_resolved     | 2     |
 * | 1         | 1          | no_corroboration      | 1     |
 * | 1         | > 1        | conflict_inconclusive | 1     |
 *
 * An inconclusive conflict still reports the quality-preferred value, at level 1.
 */
export function classifyExclusive<V>(ledger: Ledger<V>): ExclusiveVerdict<V> {
  const maxCount = ledger.maxCount();
  if (maxCount === 0) {
    return { winner: null, outcome: 'no_evidence', verifiedLevel: 0 };
  }

  const topValues = ledger.valuesAt(maxCount);
  if (maxCount >= QUORUM) {
    if (topValues.length === 1) {
      return { winner: topValues[0] ?? null, outcome: 'verified', verifiedLevel: 2 };
    }
    return { winner: pickByQuality(ledger, topValues), outcome: 'conflict_resolved', verifiedLevel: 2 };
  }

  if (topValues.length === 1) {
    return { winner: topValues[0] ?? null, outcome: 'no_corroboration', verifiedLevel: 1 };
  }
  return { winner: pickByQuality(ledger, topValues), outcome: 'conflict_inconclusive', verifiedLevel: 1 };
}

/*
 * Set-inclusive resolution: every value at quorum is verified, values seen on
 * exactly one domain are reported as unverified.
 */
export function classifySet<V>(ledger: Ledger<V>): SetVerdict<V> {
  const entries = ledger.list();
  const verified = entries.filter((e) => e.independentDomainCount >= QUORUM).map((e) => e.value);
  const unverified = entries.filter((e) => e.independentDomainCount === 1).map((e) => e.value);

  if (verified.length > 0) {
    return { verified, unverified, outcome: 'verified', verifiedLevel: 2 };
  }
  if (unverified.length > 0) {
    return { verified, unverified, outcome: 'partial', verifiedLevel: 1 };
  }
  return { verified, unverified, outcome: 'no_evidence', verifiedLevel: 0 };
}
