import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { parseAggregateOptions, parseVerifyOptions } from '../src/boundaries/cli-parser';
import { buildRetriever } from '../src/cli/commands';
import { RankedListRetriever } from '../src/retrieval/retriever';
import { EmbeddingRetriever } from '../src/retrieval/embedding-retriever';
import { ProviderType } from '../src/providers/provider-factory';
import type { Config } from '../src/schemas/config-schemas';
import type { EnvConfig } from '../src/schemas/env-schemas';
import { ConfigError, ValidationError } from '../src/errors/index';

describe('parseVerifyOptions', () => {
  it('coerces numbers and fills defaults', () => {
    expect(parseVerifyOptions({ maxScans: '5', topN: '8', person: ['Ada Example'] })).toEqual({
      person: ['Ada Example'],
      maxScans: 5,
      topN: 8,
      output: 'line',
      verbose: false,
      showPrompt: false,
      showPromptTrunc: false,
      debugJson: false,
    });
  });

  it('rejects bad values', () => {
    expect(() => parseVerifyOptions({ maxScans: '0' })).toThrow(ValidationError);
    expect(() => parseVerifyOptions({ output: 'xml' })).toThrow(/^Invalid verify options: output: /);
    expect(() => parseVerifyOptions({ stopPolicy: 'never' })).toThrow(/^Invalid verify options: stopPolicy: /);
  });
});

describe('parseAggregateOptions', () => {
  it('defaults the prefix', () => {
    expect(parseAggregateOptions({ outputDir: 'merged' })).toEqual({ prefix: 'people', outputDir: 'merged' });
  });

  it('rejects an empty prefix', () => {
    expect(() => parseAggregateOptions({ prefix: '' })).toThrow(
      'Invalid aggregate options: prefix: String must contain at least 1 character(s)'
    );
  });
});

describe('buildRetriever', () => {
  let dir: string;

  const env: EnvConfig = {
    LLM_PROVIDER: ProviderType.Anthropic,
    ANTHROPIC_API_KEY: 'test-key',
    ANTHROPIC_MODEL: 'claude-3-5-haiku-latest',
    ANTHROPIC_MAX_TOKENS: 1024,
    EMBEDDING_MODEL: 'text-embedding-3-small',
  };

  function config(extra: Partial<Config> = {}): Config {
    return {
      chunksPath: path.join(dir, 'chunks.json'),
      outputDir: path.join(dir, 'outputs'),
      promptsPath: path.join(dir, 'prompts'),
      concurrency: 4,
      maxScans: 10,
      topN: 10,
      extractorTimeoutMs: 30_000,
      stopPolicy: 'quorum',
      minSimilarity: 0.2,
      configDir: dir,
      ...extra,
    };
  }

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'factledger-cli-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prefers the ranked candidates file', () => {
    const candidatesPath = path.join(dir, 'candidates.jsonl');
    writeFileSync(candidatesPath, '{"person_name":"Ada Example","chunk_id":"c1","rank":1}\n');

    expect(buildRetriever(config({ candidatesPath, embeddingsPath: 'unused' }), env)).toBeInstanceOf(
      RankedListRetriever
    );
  });

  it('uses embeddings when an embedding key is set', () => {
    const embeddingsPath = path.join(dir, 'embedded.jsonl');
    writeFileSync(embeddingsPath, '{"chunk_id":"c1","person_name":"Ada Example","source_url":"https://a.org","embedding":[1,0]}\n');

    expect(buildRetriever(config({ embeddingsPath }), { ...env, EMBEDDING_API_KEY: 'test-embedding-key' })).toBeInstanceOf(
      EmbeddingRetriever
    );
    expect(() => buildRetriever(config({ embeddingsPath }), env)).toThrow(
      'EmbeddingsPath is set but no EMBEDDING_API_KEY (or OpenAI key) is available'
    );
  });

  it('needs a candidate source', () => {
    expect(() => buildRetriever(config(), env)).toThrow(
      new ConfigError('Set CandidatesPath or EmbeddingsPath in the config file')
    );
  });
});
