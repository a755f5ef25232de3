import type { ClaimExtractor } from './claim-extractor';
import { runScan, type ScanInput, type ScanOptions } from './engine';
import { BIRTH_YEAR_SHAPE } from './shapes/birth-year';
import { LIFE_STATUS_SHAPE } from './shapes/life-status';
import { NATIONALITY_SHAPE } from './shapes/nationality';
import { Attribute, type LifeStatusClaim, type ScanStats, type VerificationResult } from './types';

/*
 * An extractor paired with the attribute whose claims it produces, so the
 * value type and the claim shape always agree.
 */
export type AttributeExtractor =
  | { attribute: Attribute.BirthYear; extractor: ClaimExtractor<number> }
  | { attribute: Attribute.LifeStatus; extractor: ClaimExtractor<LifeStatusClaim> }
  | { attribute: Attribute.Nationality; extractor: ClaimExtractor<string[]> };

export type PersonScanInput = Omit<ScanInput<unknown>, 'extractor'>;

export async function verifyPerson(
  job: AttributeExtractor,
  input: PersonScanInput,
  options: ScanOptions = {}
): Promise<VerificationResult> {
  switch (job.attribute) {
    case Attribute.BirthYear:
      return runScan(BIRTH_YEAR_SHAPE, { ...input, extractor: job.extractor }, options);
    case Attribute.LifeStatus:
      return runScan(LIFE_STATUS_SHAPE, { ...input, extractor: job.extractor }, options);
    case Attribute.Nationality:
      return runScan(NATIONALITY_SHAPE, { ...input, extractor: job.extractor }, options);
  }
}

const EMPTY_STATS: ScanStats = {
  scannedCount: 0,
  skippedCount: 0,
  extractorFailures: 0,
  absentClaims: 0,
  stopReason: 'no_candidates',
};

/*
 * The no_evidence-shaped result recorded for a person whose scan failed
 * outright, so a batch never loses a row.
 */
export function failedResult(attribute: Attribute, personName: string, message: string): VerificationResult {
  switch (attribute) {
    case Attribute.BirthYear:
      return { ...BIRTH_YEAR_SHAPE.resolve(personName, BIRTH_YEAR_SHAPE.createTally(), EMPTY_STATS), error: message };
    case Attribute.LifeStatus:
      return { ...LIFE_STATUS_SHAPE.resolve(personName, LIFE_STATUS_SHAPE.createTally(), EMPTY_STATS), error: message };
    case Attribute.Nationality:
      return { ...NATIONALITY_SHAPE.resolve(personName, NATIONALITY_SHAPE.createTally(), EMPTY_STATS), error: message };
  }
}
