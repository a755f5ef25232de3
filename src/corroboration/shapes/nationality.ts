import { EVIDENCE_VOCABULARIES } from '../evidence-classifier';
import { Ledger } from '../ledger';
import { classifySet } from '../outcome-classifier';
import {
  Attribute,
  QUORUM,
  type EvidenceRecord,
  type NationalityDetail,
  type NationalityResult,
} from '../types';
import type { ClaimTally, ShapeStrategy } from './shape';

export class SetTally implements ClaimTally<string[]> {
  readonly ledger = new Ledger<string>();

  record(codes: string[], evidence: EvidenceRecord): void {
    for (const code of codes) {
      this.ledger.record(code, evidence);
    }
  }

  quorumReached(): boolean {
    return this.ledger.maxCount() >= QUORUM;
  }
}

/*
 * A person may hold several nationalities, so one code reaching quorum never
 * ends the scan: every code gets the full budget to verify independently.
 */
export const NATIONALITY_SHAPE: ShapeStrategy<string[], SetTally, NationalityResult> = {
  attribute: Attribute.Nationality,
  shape: 'set-inclusive',
  vocabulary: EVIDENCE_VOCABULARIES[Attribute.Nationality],
  stopsOnQuorum: false,

  createTally: () => new SetTally(),

  describe: (codes) => `[${codes.join(', ')}]`,

  resolve(personName, tally, stats) {
    const verdict = classifySet(tally.ledger);
    const details: Record<string, NationalityDetail> = {};
    for (const entry of tally.ledger.list()) {
      details[entry.value] = { count: entry.independentDomainCount, sources: [...entry.sources] };
    }
    return {
      attribute: Attribute.Nationality,
      personName,
      nationalities: verdict.verified,
      unverifiedNationalities: verdict.unverified,
      verifiedLevel: verdict.verifiedLevel,
      outcome: verdict.outcome,
      ...stats,
      details,
    };
  },
};
