import { describe, it, expect } from 'vitest';
import { failedResult, verifyPerson } from '../src/corroboration/verify';
import { Attribute } from '../src/corroboration/types';
import { PERSON, ScriptedExtractor, chunkIndexOf, present, refsOf } from './utils';

describe('verifyPerson', () => {
  it('dispatches to the shape of the attribute', async () => {
    const chunks = chunkIndexOf([
      ['c1', 'https://a.org/x', 'one'],
      ['c2', 'https://b.org/x', 'two'],
    ]);
    const result = await verifyPerson(
      {
        attribute: Attribute.Nationality,
        extractor: new ScriptedExtractor<string[]>({ one: present(['FRA']), two: present(['FRA']) }),
      },
      { personName: PERSON, candidates: refsOf(['c1', 'c2']), chunks }
    );

    expect(result.attribute).toBe(Attribute.Nationality);
    expect(result.outcome).toBe('verified');
    if (result.attribute === Attribute.Nationality) {
      expect(result.nationalities).toEqual(['FRA']);
    }
  });
});

describe('failedResult', () => {
  it('builds a no_evidence result carrying the error', () => {
    const result = failedResult(Attribute.BirthYear, PERSON, 'retrieval failed');

    expect(result).toEqual({
      attribute: Attribute.BirthYear,
      personName: PERSON,
      birthYear: null,
      verifiedLevel: 0,
      outcome: 'no_evidence',
      scannedCount: 0,
      skippedCount: 0,
      extractorFailures: 0,
      absentClaims: 0,
      stopReason: 'no_candidates',
      winnerSources: [],
      runnerUps: [],
      error: 'retrieval failed',
    });
  });

  it('uses the unknown status for life status', () => {
    const result = failedResult(Attribute.LifeStatus, PERSON, 'boom');
    expect(result.outcome).toBe('no_evidence');
    if (result.attribute === Attribute.LifeStatus) {
      expect(result.status).toBe('unknown');
      expect(result.deathYear).toBeNull();
    }
  });
});
