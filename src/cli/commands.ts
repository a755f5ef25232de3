import type { Command } from 'commander';
import { existsSync } from 'fs';
import { z } from 'zod';
import { createEmbeddingProvider, createProvider } from '../providers/provider-factory';
import { loadPrompts, findPromptForAttribute } from '../prompts/prompt-loader';
import { renderTemplate } from '../prompts/template-renderer';
import { createLlmExtractor } from '../extraction/llm-claim-extractor';
import { loadChunkIndex, loadConfig, parseEnvironment, parseVerifyOptions, pricingFromEnv, readJsonl } from '../boundaries/index';
import { RankedListRetriever, type CandidateRetriever } from '../retrieval/retriever';
import { EmbeddingRetriever } from '../retrieval/embedding-retriever';
import { CANDIDATE_ROW_SCHEMA, EMBEDDED_CHUNK_ROW_SCHEMA } from '../schemas/evidence-schemas';
import type { Config } from '../schemas/config-schemas';
import type { VerifyOptions } from '../schemas/cli-schemas';
import type { PromptFile } from '../prompts/prompt-loader';
import type { ChunkIndex } from '../boundaries/chunk-store';
import type { AttributeExtractor } from '../corroboration/verify';
import type { EnvConfig } from '../schemas/env-schemas';
import { Attribute, type Outcome, type VerificationResult } from '../corroboration/types';
import { verifiedFilePath } from '../aggregation/aggregate';
import { appendJsonl } from '../boundaries/jsonl';
import { toRecord } from '../output/record-formatter';
import { printBatchSummary, printResultRow, printTokenUsage } from '../output/reporter';
import { error as logError, setSilentMode, warn } from '../output/logger';
import { TokenUsageCounter } from '../types/token-usage';
import { ConfigError, handleUnknownError } from '../errors/index';
import { runBatch } from './batch-runner';
import { EXIT_CANCELLED, OutputFormat } from './types';

const ATTRIBUTE_SCHEMA = z.nativeEnum(Attribute);

interface VerifySetup {
  prompt: PromptFile;
  chunks: ChunkIndex;
  retriever: CandidateRetriever;
  job: AttributeExtractor;
}

const VERIFIED_OUTCOMES = new Set<Outcome>(['verified', 'conflict_resolved']);
const PARTIAL_OUTCOMES = new Set<Outcome>(['no_corroboration', 'partial', 'conflict_inconclusive']);

export function buildRetriever(config: Config, env: EnvConfig): CandidateRetriever {
  if (config.candidatesPath) {
    return new RankedListRetriever(readJsonl(config.candidatesPath, CANDIDATE_ROW_SCHEMA));
  }
  if (config.embeddingsPath) {
    const embeddings = createEmbeddingProvider(env);
    if (!embeddings) {
      throw new ConfigError('EmbeddingsPath is set but no EMBEDDING_API_KEY (or OpenAI key) is available');
    }
    return new EmbeddingRetriever(readJsonl(config.embeddingsPath, EMBEDDED_CHUNK_ROW_SCHEMA), embeddings, {
      minSimilarity: config.minSimilarity,
    });
  }
  throw new ConfigError('Set CandidatesPath or EmbeddingsPath in the config file');
}

function fail(context: string, e: unknown): never {
  const err = handleUnknownError(e, context);
  logError(`Error: ${err.message}`);
  process.exit(1);
}

/*
 * Registers `verify <attribute>`: retrieves candidates for each person,
 * runs the corroboration scan and appends one record per person.
 */
export function registerVerifyCommand(program: Command, shutdown: AbortSignal): void {
  program
    .command('verify')
    .description('Corroborate one attribute for every person across their sources')
    .argument('<attribute>', 'birth-year, life-status or nationality')
    .option('--person <names...>', 'Only verify these people (default: everyone in the chunk index)')
    .option('--max-scans <n>', 'Chunks to scan per person before giving up')
    .option('--top-n <n>', 'Candidates to retrieve per person')
    .option('--stop-policy <policy>', 'quorum (stop at two sources) or exhaustive')
    .option('--concurrency <n>', 'People verified in parallel')
    .option('--timeout <ms>', 'Per-chunk extractor timeout in milliseconds')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a custom .factledger.ini config file')
    .option('-v, --verbose', 'Print per-chunk progress')
    .option('--show-prompt', 'Print full prompt and injected content')
    .option('--show-prompt-trunc', 'Print truncated prompt/content previews (500 chars)')
    .option('--debug-json', 'Print full JSON response from the API')
    .action(async (attributeArg: string, rawOptions: unknown) => {
      let attribute: Attribute;
      let options: VerifyOptions;
      try {
        attribute = ATTRIBUTE_SCHEMA.parse(attributeArg);
        options = parseVerifyOptions(rawOptions);
      } catch (e: unknown) {
        if (e instanceof z.ZodError) {
          fail('Parsing attribute', new Error(`Unknown attribute '${attributeArg}'. Use birth-year, life-status or nationality.`));
        }
        fail('Parsing CLI options', e);
      }

      const jsonOutput = options.output === OutputFormat.Json;
      setSilentMode(jsonOutput);

      let env: EnvConfig;
      try {
        env = parseEnvironment();
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Validating environment variables');
        logError(`Error: ${err.message}`);
        logError('Please set these in your .env file or environment.');
        process.exit(1);
      }

      let config: Config;
      try {
        config = loadConfig(process.cwd(), options.config);
      } catch (e: unknown) {
        fail('Loading configuration', e);
      }

      if (!existsSync(config.promptsPath)) {
        fail('Loading prompts', new Error(`prompts path does not exist: ${config.promptsPath}`));
      }

      const usage = new TokenUsageCounter();
      let setup: VerifySetup;
      try {
        const loaded = loadPrompts(config.promptsPath);
        if (options.verbose) {
          for (const warning of loaded.warnings) warn(warning);
        }
        const prompt = findPromptForAttribute(loaded.prompts, attribute);
        const provider = createProvider(env, {
          debug: options.verbose,
          showPrompt: options.showPrompt,
          showPromptTrunc: options.showPromptTrunc,
          debugJson: options.debugJson,
        });
        const chunks = loadChunkIndex(config.chunksPath);
        setup = {
          prompt,
          chunks,
          retriever: buildRetriever(config, env),
          job: createLlmExtractor(attribute, provider, prompt, usage),
        };
      } catch (e: unknown) {
        fail('Preparing verification', e);
      }

      const people = options.person ?? setup.chunks.personNames();
      const maxScans = options.maxScans ?? config.maxScans;
      const outputPath = verifiedFilePath(config.outputDir, attribute);

      const onResult = (result: VerificationResult): void => {
        const record = toRecord(result);
        appendJsonl(outputPath, record);
        if (jsonOutput) {
          process.stdout.write(`${JSON.stringify(record)}\n`);
        } else {
          printResultRow(result, maxScans);
        }
      };

      const batch = await runBatch({
        people,
        job: setup.job,
        retriever: setup.retriever,
        chunks: setup.chunks,
        query: (personName) => renderTemplate(setup.prompt.meta.query, { person_name: personName }),
        topN: options.topN ?? config.topN,
        concurrency: options.concurrency ?? config.concurrency,
        scan: {
          maxScans,
          stopPolicy: options.stopPolicy ?? config.stopPolicy,
          extractorTimeoutMs: options.timeout ?? config.extractorTimeoutMs,
          verbose: options.verbose,
        },
        signal: shutdown,
        onResult,
      });

      if (!jsonOutput) {
        printBatchSummary({
          attribute,
          people: people.length,
          verified: batch.results.filter((r) => VERIFIED_OUTCOMES.has(r.outcome)).length,
          partial: batch.results.filter((r) => PARTIAL_OUTCOMES.has(r.outcome)).length,
          unresolved: batch.results.filter((r) => r.outcome === 'no_evidence').length,
          failures: batch.failures,
          cancelled: batch.cancelled,
          outputPath,
        });
        if (options.verbose) {
          printTokenUsage(usage.stats(pricingFromEnv(env)));
        }
      }

      if (shutdown.aborted) {
        process.exit(EXIT_CANCELLED);
      }
      process.exit(batch.failures > 0 ? 1 : 0);
    });
}
