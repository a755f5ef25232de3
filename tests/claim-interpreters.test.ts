import { describe, it, expect } from 'vitest';
import {
  interpretBirthResponse,
  interpretLifeStatusResponse,
  interpretNationalityResponse,
} from '../src/extraction/claim-interpreters';

describe('interpretBirthResponse', () => {
  it('accepts a plausible stated year', () => {
    expect(
      interpretBirthResponse({ reasoning: 'Stated in the infobox.', contains_birthdate: true, birth_year: 1950 })
    ).toEqual({ present: true, value: 1950 });
  });

  it('falls back to the first year in the reasoning', () => {
    expect(
      interpretBirthResponse({
        reasoning: 'The text says she was born on 3 May 1948 and moved in 1970.',
        contains_birthdate: true,
        birth_year: null,
      })
    ).toEqual({ present: true, value: 1948 });
  });

  it('rejects an implausible year when the reasoning has none', () => {
    expect(
      interpretBirthResponse({ reasoning: 'A birthday is mentioned.', contains_birthdate: true, birth_year: 1234 })
    ).toEqual({ present: false, reason: 'birth date present but no year parsed' });
  });

  it('reports no birth date', () => {
    expect(
      interpretBirthResponse({ reasoning: 'Nothing about birth.', contains_birthdate: false, birth_year: 1950 })
    ).toEqual({ present: false, reason: 'no birth date' });
  });
});

describe('interpretLifeStatusResponse', () => {
  it('maps alive', () => {
    expect(interpretLifeStatusResponse({ reasoning: 'Serves as mayor.', status: 'alive', death_year: null })).toEqual({
      present: true,
      value: { status: 'alive' },
    });
  });

  it('maps deceased with a year', () => {
    expect(
      interpretLifeStatusResponse({ reasoning: 'Obituary.', status: 'deceased', death_year: 2001 })
    ).toEqual({ present: true, value: { status: 'deceased', year: 2001 } });
  });

  it('needs a year for deceased', () => {
    expect(
      interpretLifeStatusResponse({ reasoning: 'He passed away.', status: 'deceased', death_year: null })
    ).toEqual({ present: false, reason: 'deceased but no death year parsed' });
  });

  it('treats unknown as absent', () => {
    expect(
      interpretLifeStatusResponse({ reasoning: 'Unclear.', status: 'unknown', death_year: 1999 })
    ).toEqual({ present: false, reason: 'status unknown' });
  });
});

describe('interpretNationalityResponse', () => {
  it('normalizes and de-duplicates codes in order', () => {
    expect(
      interpretNationalityResponse({
        reasoning: 'French and Italian citizen.',
        nationalities_found: true,
        nationalities: [' fra', 'ITA', 'FRA', 'France', 'it'],
      })
    ).toEqual({ present: true, value: ['FRA', 'ITA'] });
  });

  it('is absent when no valid code remains', () => {
    expect(
      interpretNationalityResponse({ reasoning: 'French.', nationalities_found: true, nationalities: ['French'] })
    ).toEqual({ present: false, reason: 'no valid ISO alpha-3 code' });
  });

  it('is absent when nothing was found', () => {
    expect(
      interpretNationalityResponse({ reasoning: '', nationalities_found: false, nationalities: ['FRA'] })
    ).toEqual({ present: false, reason: 'no nationality' });
  });
});
