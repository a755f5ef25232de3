import {
  Attribute,
  type EvidenceRecord,
  type ScanStats,
  type ValueTally,
  type VerificationResult,
} from '../corroboration/types';

export interface SourceRecordJson {
  url: string;
  chunk_index: number | null;
  domain: string;
  evidence_type: string;
  quality_rank: number;
  authority: string;
}

export interface RunnerUpJson {
  year: number;
  count: number;
  sample_source: SourceRecordJson | null;
}

export type VerificationRecord = Record<string, unknown>;

export function toSourceRecord(source: EvidenceRecord): SourceRecordJson {
  return {
    url: source.url,
    chunk_index: source.chunkIndex,
    domain: source.domain,
    evidence_type: source.evidenceType,
    quality_rank: source.qualityRank,
    authority: source.authority,
  };
}

function toRunnerUps(tallies: readonly ValueTally<number>[]): RunnerUpJson[] {
  return tallies.map((t) => ({
    year: t.value,
    count: t.count,
    sample_source: t.sampleSource ? toSourceRecord(t.sampleSource) : null,
  }));
}

function scanFields(result: ScanStats & { error?: string }): VerificationRecord {
  return {
    scanned_count: result.scannedCount,
    skipped_count: result.skippedCount,
    extractor_failures: result.extractorFailures,
    absent_claims: result.absentClaims,
    stop_reason: result.stopReason,
    ...(result.error !== undefined && { error: result.error }),
  };
}

/**
 * Serializes a result as one output line object. Key order is fixed per
 * attribute so identical results serialize to identical bytes.
 */
export function toRecord(result: VerificationResult): VerificationRecord {
  const head = { person_name: result.personName, attribute: result.attribute };
  const verdict = { verified_level: result.verifiedLevel, outcome: result.outcome };

  switch (result.attribute) {
    case Attribute.BirthYear:
      return {
        ...head,
        birth_year: result.birthYear,
        ...verdict,
        winner_year: result.birthYear,
        winner_sources: result.winnerSources.map(toSourceRecord),
        runner_up_years: toRunnerUps(result.runnerUps),
        ...scanFields(result),
      };
    case Attribute.LifeStatus:
      return {
        ...head,
        status: result.status,
        death_year: result.deathYear,
        ...verdict,
        death_year_sources: result.winnerSources.map(toSourceRecord),
        alive_signals: result.aliveSignals.map(toSourceRecord),
        runner_up_years: toRunnerUps(result.runnerUps),
        ...scanFields(result),
      };
    case Attribute.Nationality: {
      const details: Record<string, { count: number; sources: SourceRecordJson[] }> = {};
      for (const [code, detail] of Object.entries(result.details)) {
        details[code] = { count: detail.count, sources: detail.sources.map(toSourceRecord) };
      }
      return {
        ...head,
        nationalities: result.nationalities,
        unverified_nationalities: result.unverifiedNationalities,
        ...verdict,
        nationality_details: details,
        ...scanFields(result),
      };
    }
  }
}

export function serializeRecord(result: VerificationResult): string {
  return JSON.stringify(toRecord(result));
}
