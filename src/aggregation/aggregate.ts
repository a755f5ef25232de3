import * as path from 'path';
import type { z } from 'zod';
import { Attribute } from '../corroboration/types';
import { VERIFIED_FILE_SUFFIX } from '../config/constants';
import { readJsonlIfExists, writeJsonl } from '../boundaries/jsonl';
import {
  BIRTH_YEAR_RECORD_SCHEMA,
  LIFE_STATUS_RECORD_SCHEMA,
  NATIONALITY_RECORD_SCHEMA,
  type BirthYearRecord,
  type LifeStatusRecord,
  type NationalityRecord,
  type SourceRecord,
} from '../schemas/record-schemas';

export interface AttributeRecords {
  birthYear: readonly BirthYearRecord[];
  lifeStatus: readonly LifeStatusRecord[];
  nationality: readonly NationalityRecord[];
}

export interface PersonDataRecord {
  person_id: string;
  person_name: string;
  biographical: {
    birth_year: number | null;
    death_year: number | null;
    status: 'deceased' | 'alive' | 'unknown';
    nationalities: string[];
  };
}

export interface PersonSourcesRecord {
  person_id: string;
  biographical_sources: {
    birth_year?: { verified_level: number; outcome: string; winner_sources: SourceRecord[] };
    death_year?: {
      status: string;
      verified_level: number;
      outcome: string;
      alive_signals: SourceRecord[];
      death_year_sources: SourceRecord[];
    };
    nationalities?: {
      verified_level: number;
      outcome: string;
      nationality_details: NationalityRecord['nationality_details'];
    };
  };
}

export interface AggregateResult {
  data: PersonDataRecord[];
  sources: PersonSourcesRecord[];
}

export function personId(personName: string): string {
  return personName.toLowerCase().replaceAll(' ', '_');
}

/** Later records for the same person replace earlier ones. */
export function lastByPerson<T extends { person_name: string }>(records: readonly T[]): Map<string, T> {
  const byName = new Map<string, T>();
  for (const record of records) {
    byName.set(record.person_name, record);
  }
  return byName;
}

/**
 * Joins the per-attribute records by person name. People are emitted in
 * sorted name order; a missing attribute leaves its defaults.
 */
export function aggregateRecords(records: AttributeRecords): AggregateResult {
  const births = lastByPerson(records.birthYear);
  const lives = lastByPerson(records.lifeStatus);
  const nations = lastByPerson(records.nationality);

  const names = [...new Set([...births.keys(), ...lives.keys(), ...nations.keys()])].sort();

  const data: PersonDataRecord[] = [];
  const sources: PersonSourcesRecord[] = [];
  for (const name of names) {
    const id = personId(name);
    const birth = births.get(name);
    const life = lives.get(name);
    const nationality = nations.get(name);

    data.push({
      person_id: id,
      person_name: name,
      biographical: {
        birth_year: birth?.birth_year ?? null,
        death_year: life?.death_year ?? null,
        status: life?.status ?? 'unknown',
        nationalities: nationality?.nationalities ?? [],
      },
    });

    sources.push({
      person_id: id,
      biographical_sources: {
        ...(birth && {
          birth_year: {
            verified_level: birth.verified_level,
            outcome: birth.outcome,
            winner_sources: birth.winner_sources,
          },
        }),
        ...(life && {
          death_year: {
            status: life.status,
            verified_level: life.verified_level,
            outcome: life.outcome,
            alive_signals: life.alive_signals,
            death_year_sources: life.death_year_sources,
          },
        }),
        ...(nationality && {
          nationalities: {
            verified_level: nationality.verified_level,
            outcome: nationality.outcome,
            nationality_details: nationality.nationality_details,
          },
        }),
      },
    });
  }
  return { data, sources };
}

export function verifiedFilePath(outputDir: string, attribute: Attribute): string {
  return path.join(outputDir, `${attribute}${VERIFIED_FILE_SUFFIX}`);
}

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface AggregateRunOptions {
  inputDir: string;
  outputDir: string;
  prefix: string;
  now?: Date;
}

export interface AggregateRunResult {
  people: number;
  dataPath: string;
  sourcesPath: string;
}

function readRecords<T>(inputDir: string, attribute: Attribute, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return readJsonlIfExists(verifiedFilePath(inputDir, attribute), schema);
}

export function runAggregation(options: AggregateRunOptions): AggregateRunResult {
  const result = aggregateRecords({
    birthYear: readRecords(options.inputDir, Attribute.BirthYear, BIRTH_YEAR_RECORD_SCHEMA),
    lifeStatus: readRecords(options.inputDir, Attribute.LifeStatus, LIFE_STATUS_RECORD_SCHEMA),
    nationality: readRecords(options.inputDir, Attribute.Nationality, NATIONALITY_RECORD_SCHEMA),
  });

  const stamp = formatTimestamp(options.now ?? new Date());
  const dataPath = path.join(options.outputDir, `${options.prefix}_data_${stamp}.jsonl`);
  const sourcesPath = path.join(options.outputDir, `${options.prefix}_sources_${stamp}.jsonl`);
  writeJsonl(dataPath, result.data);
  writeJsonl(sourcesPath, result.sources);

  return { people: result.data.length, dataPath, sourcesPath };
}
