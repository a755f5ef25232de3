import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { SchemaValidationError } from '../errors/validation-errors';
import { ProcessingError, handleUnknownError } from '../errors/index';

/**
 * Reads a JSON Lines file, validating every non-blank line.
 *
 * @throws SchemaValidationError naming the file and line of the first bad row
 */
export function readJsonl<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${filePath}`);
    throw new ProcessingError(`Failed to read ${filePath}: ${err.message}`);
  }

  const rows: T[] = [];
  const lines = raw.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    const where = `${path.basename(filePath)}:${i + 1}`;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'JSON parsing');
      throw new SchemaValidationError(`invalid JSON: ${err.message}`, where, line, e);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new SchemaValidationError(issues, where, parsed, result.error);
    }
    rows.push(result.data);
  }
  return rows;
}

/** Like readJsonl, but a missing file reads as empty. */
export function readJsonlIfExists<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return existsSync(filePath) ? readJsonl(filePath, schema) : [];
}

/**
 * Appends one record as a single line, creating the parent directory when
 * needed.
 */
export function appendJsonl(filePath: string, record: unknown): void {
  mkdirSync(path.dirname(filePath), { recursive: true });
  appendFileSync(filePath, `${JSON.stringify(record)}\n`, 'utf-8');
}

export function writeJsonl(filePath: string, records: readonly unknown[]): void {
  mkdirSync(path.dirname(filePath), { recursive: true });
  const body = records.map((record) => JSON.stringify(record)).join('\n');
  writeFileSync(filePath, records.length > 0 ? `${body}\n` : '', 'utf-8');
}
