import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';

enum ConfigKey {
  CHUNKS_PATH = 'ChunksPath',
  CANDIDATES_PATH = 'CandidatesPath',
  EMBEDDINGS_PATH = 'EmbeddingsPath',
  OUTPUT_DIR = 'OutputDir',
  PROMPTS_PATH = 'PromptsPath',
  CONCURRENCY = 'Concurrency',
  MAX_SCANS = 'MaxScans',
  TOP_N = 'TopN',
  EXTRACTOR_TIMEOUT_MS = 'ExtractorTimeoutMs',
  STOP_POLICY = 'StopPolicy',
  MIN_SIMILARITY = 'MinSimilarity',
}

const PATH_KEYS = new Set<string>([
  ConfigKey.CHUNKS_PATH,
  ConfigKey.CANDIDATES_PATH,
  ConfigKey.EMBEDDINGS_PATH,
  ConfigKey.OUTPUT_DIR,
  ConfigKey.PROMPTS_PATH,
]);

const INTEGER_KEYS = new Set<string>([
  ConfigKey.CONCURRENCY,
  ConfigKey.MAX_SCANS,
  ConfigKey.TOP_N,
  ConfigKey.EXTRACTOR_TIMEOUT_MS,
]);

function stripQuotes(str: string): string {
  return str.replace(/^"|"$/g, '').replace(/^'|'$/g, '');
}

/*
 * Reads `Key = value` pairs outside any section. Comment lines start with
 * `#` or `;`. Sections are ignored.
 */
export function parseIniGlobals(raw: string): Map<string, string> {
  const values = new Map<string, string>();
  let inSection = false;
  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;
    if (/^\[.*\]$/.test(line)) {
      inSection = true;
      continue;
    }
    if (inSection) continue;
    const m = line.match(/^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/);
    if (!m || !m[1]) continue;
    values.set(m[1], stripQuotes((m[2] ?? '').trim()));
  }
  return values;
}

function parseNumber(key: string, value: string): number {
  const parsed = INTEGER_KEYS.has(key) ? Number.parseInt(value, 10) : Number.parseFloat(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Invalid ${key} value: ${value}`);
  }
  return parsed;
}

/**
 * Load and validate configuration from a .factledger.ini file.
 * Relative paths resolve against the directory of the file.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const iniPath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(iniPath)) {
    throw new ConfigError(`Missing configuration file at ${iniPath}`);
  }

  const configDir = path.dirname(iniPath);

  let values: Map<string, string>;
  try {
    values = parseIniGlobals(readFileSync(iniPath, 'utf-8'));
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  const known = new Set<string>(Object.values(ConfigKey));
  const resolvePath = (value: string): string =>
    path.isAbsolute(value) ? value : path.resolve(configDir, value);

  const data: Record<string, unknown> = {
    configDir,
    outputDir: resolvePath('outputs'),
    promptsPath: resolvePath('prompts'),
  };

  for (const [key, value] of values) {
    if (!known.has(key)) {
      throw new ConfigError(`Unknown config key: ${key}`);
    }
    const field = key.charAt(0).toLowerCase() + key.slice(1);
    if (PATH_KEYS.has(key)) {
      data[field] = resolvePath(value);
    } else if (key === ConfigKey.STOP_POLICY) {
      data[field] = value;
    } else {
      data[field] = parseNumber(key, value);
    }
  }

  if (!values.get(ConfigKey.CHUNKS_PATH)) {
    throw new ConfigError(`${ConfigKey.CHUNKS_PATH} is required in config file`);
  }

  try {
    return CONFIG_SCHEMA.parse(data);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const details = e.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ValidationError(`Invalid configuration: ${details}`, e);
    }
    const err = handleUnknownError(e, 'Config validation');
    throw new ConfigError(`Configuration validation failed: ${err.message}`);
  }
}
