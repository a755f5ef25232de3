import { EVIDENCE_VOCABULARIES } from '../evidence-classifier';
import { Ledger } from '../ledger';
import { classifyExclusive } from '../outcome-classifier';
import { Attribute, QUORUM, type BirthYearResult, type EvidenceRecord } from '../types';
import type { ClaimTally, ShapeStrategy } from './shape';

export class ExclusiveTally<V> implements ClaimTally<V> {
  readonly ledger = new Ledger<V>();

  record(value: V, evidence: EvidenceRecord): void {
    this.ledger.record(value, evidence);
  }

  quorumReached(): boolean {
    return this.ledger.maxCount() >= QUORUM;
  }
}

export const BIRTH_YEAR_SHAPE: ShapeStrategy<number, ExclusiveTally<number>, BirthYearResult> = {
  attribute: Attribute.BirthYear,
  shape: 'scalar-exclusive',
  vocabulary: EVIDENCE_VOCABULARIES[Attribute.BirthYear],
  stopsOnQuorum: true,

  createTally: () => new ExclusiveTally<number>(),

  describe: (year) => `year=${year}`,

  resolve(personName, tally, stats) {
    const verdict = classifyExclusive(tally.ledger);
    const winner = verdict.winner;
    return {
      attribute: Attribute.BirthYear,
      personName,
      birthYear: winner,
      verifiedLevel: verdict.verifiedLevel,
      outcome: verdict.outcome,
      ...stats,
      winnerSources: winner === null ? [] : [...(tally.ledger.entry(winner)?.sources ?? [])],
      runnerUps: tally.ledger.tallies(winner ?? undefined),
    };
  },
};
