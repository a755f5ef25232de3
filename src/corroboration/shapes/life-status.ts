import { EVIDENCE_VOCABULARIES } from '../evidence-classifier';
import { Ledger } from '../ledger';
import { classifyExclusive } from '../outcome-classifier';
import {
  Attribute,
  QUORUM,
  type EvidenceRecord,
  type LifeStatusClaim,
  type LifeStatusResult,
  type Outcome,
  type VerifiedLevel,
} from '../types';
import type { ClaimTally, ShapeStrategy } from './shape';

/*
 * Death years are tallied per year. "Alive" carries no value, so its ledger
 * has a single key and its count is the number of domains asserting it.
 */
export class LifeStatusTally implements ClaimTally<LifeStatusClaim> {
  readonly deathYears = new Ledger<number>();
  readonly alive = new Ledger<'alive'>();

  record(claim: LifeStatusClaim, evidence: EvidenceRecord): void {
    if (claim.status === 'deceased') {
      this.deathYears.record(claim.year, evidence);
    } else {
      this.alive.record('alive', evidence);
    }
  }

  // Only a death year can end the scan early.
  quorumReached(): boolean {
    return this.deathYears.maxCount() >= QUORUM;
  }
}

export const LIFE_STATUS_SHAPE: ShapeStrategy<LifeStatusClaim, LifeStatusTally, LifeStatusResult> = {
  attribute: Attribute.LifeStatus,
  shape: 'categorical-exclusive',
  vocabulary: EVIDENCE_VOCABULARIES[Attribute.LifeStatus],
  stopsOnQuorum: true,

  createTally: () => new LifeStatusTally(),

  describe: (claim) => (claim.status === 'deceased' ? `deceased, year=${claim.year}` : 'alive'),

  resolve(personName, tally, stats) {
    const verdict = classifyExclusive(tally.deathYears);
    const aliveEntry = tally.alive.entry('alive');
    const aliveCount = aliveEntry?.independentDomainCount ?? 0;
    const aliveSources = [...(aliveEntry?.sources ?? [])];
    const base = { attribute: Attribute.LifeStatus as const, personName, ...stats };

    if (verdict.winner !== null && verdict.outcome !== 'conflict_inconclusive') {
      return {
        ...base,
        status: 'deceased',
        deathYear: verdict.winner,
        verifiedLevel: verdict.verifiedLevel,
        outcome: verdict.outcome,
        winnerSources: [...(tally.deathYears.entry(verdict.winner)?.sources ?? [])],
        aliveSignals: [],
        runnerUps: tally.deathYears.tallies(verdict.winner),
      };
    }

    if (aliveCount >= QUORUM) {
      return {
        ...base,
        status: 'alive',
        deathYear: null,
        verifiedLevel: 2,
        outcome: 'verified',
        winnerSources: [],
        aliveSignals: aliveSources,
        runnerUps: tally.deathYears.tallies(),
      };
    }

    let outcome: Outcome = 'no_evidence';
    let verifiedLevel: VerifiedLevel = 0;
    if (verdict.outcome === 'conflict_inconclusive') {
      outcome = 'conflict_inconclusive';
      verifiedLevel = 1;
    } else if (aliveCount === 1) {
      outcome = 'no_corroboration';
      verifiedLevel = 1;
    }
    return {
      ...base,
      status: 'unknown',
      deathYear: null,
      verifiedLevel,
      outcome,
      winnerSources: [],
      aliveSignals: aliveSources,
      runnerUps: tally.deathYears.tallies(),
    };
  },
};
