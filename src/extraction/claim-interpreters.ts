import type { Claim, LifeStatusClaim } from '../corroboration/types';
import type { BirthResponse, LifeStatusResponse, NationalityResponse } from '../schemas/claim-schemas';

export const MIN_YEAR = 1600;
export const MAX_YEAR = 2099;

const YEAR_PATTERN = /\b(1[6-9]\d{2}|20\d{2})\b/;
const ISO_ALPHA3 = /^[A-Z]{3}$/;

function isPlausibleYear(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_YEAR && year <= MAX_YEAR;
}

/*
 * The stated year when plausible; otherwise the first plausible year the
 * model mentioned in its reasoning.
 */
function resolveYear(stated: number | null, reasoning: string): number | null {
  if (stated !== null && isPlausibleYear(stated)) return stated;
  const match = YEAR_PATTERN.exec(reasoning);
  return match?.[1] ? Number(match[1]) : null;
}

export function interpretBirthResponse(response: BirthResponse): Claim<number> {
  if (!response.contains_birthdate) {
    return { present: false, reason: 'no birth date' };
  }
  const year = resolveYear(response.birth_year, response.reasoning);
  if (year === null) {
    return { present: false, reason: 'birth date present but no year parsed' };
  }
  return { present: true, value: year };
}

export function interpretLifeStatusResponse(response: LifeStatusResponse): Claim<LifeStatusClaim> {
  switch (response.status) {
    case 'alive':
      return { present: true, value: { status: 'alive' } };
    case 'deceased': {
      const year = resolveYear(response.death_year, response.reasoning);
      if (year === null) {
        return { present: false, reason: 'deceased but no death year parsed' };
      }
      return { present: true, value: { status: 'deceased', year } };
    }
    case 'unknown':
      return { present: false, reason: 'status unknown' };
  }
}

export function interpretNationalityResponse(response: NationalityResponse): Claim<string[]> {
  if (!response.nationalities_found) {
    return { present: false, reason: 'no nationality' };
  }
  const codes: string[] = [];
  for (const raw of response.nationalities) {
    const code = raw.trim().toUpperCase();
    if (ISO_ALPHA3.test(code) && !codes.includes(code)) {
      codes.push(code);
    }
  }
  if (codes.length === 0) {
    return { present: false, reason: 'no valid ISO alpha-3 code' };
  }
  return { present: true, value: codes };
}
