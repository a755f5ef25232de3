import { ScanCancelledError, handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';
import type { ScanOptions } from '../corroboration/engine';
import { failedResult, verifyPerson, type AttributeExtractor } from '../corroboration/verify';
import type { ChunkLookup, VerificationResult } from '../corroboration/types';
import type { CandidateRetriever } from '../retrieval/retriever';

/*
 * Generic concurrency runner that executes workers in parallel up to a specified limit.
 * Preserves result order matching input order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let i = 0;
  const workers = new Array(Math.max(1, Math.min(limit, items.length)))
    .fill(0)
    .map(async () => {
      while (true) {
        const idx = i++;
        if (idx >= items.length) break;
        const item = items[idx];
        if (item !== undefined) {
          results[idx] = await worker(item, idx);
        }
      }
    });
  await Promise.all(workers);
  return results;
}

export interface BatchParams {
  people: readonly string[];
  job: AttributeExtractor;
  retriever: CandidateRetriever;
  chunks: ChunkLookup;
  /** Retrieval query for one person. */
  query: (personName: string) => string;
  topN: number;
  concurrency: number;
  scan?: Omit<ScanOptions, 'signal'>;
  signal?: AbortSignal;
  /** Called once per finished person, in completion order. A throw marks that person failed. */
  onResult?: (result: VerificationResult) => void;
}

export interface BatchOutcome {
  /** Finished results in input order; cancelled people are absent. */
  results: VerificationResult[];
  failures: number;
  cancelled: number;
}

type PersonOutcome =
  | { kind: 'done'; result: VerificationResult; failed: boolean }
  | { kind: 'cancelled' };

/**
 * Verifies one attribute for many people. Scans run concurrently up to
 * `concurrency`; each person's scan is sequential.
 *
 * A person whose retrieval or scan throws gets a no_evidence result carrying
 * the error. Once `signal` aborts, in-flight scans are cancelled, nobody new
 * starts, and cancelled people produce no result.
 */
export async function runBatch(params: BatchParams): Promise<BatchOutcome> {
  const { job, retriever, chunks, signal } = params;

  const outcomes = await runWithConcurrency(
    params.people,
    params.concurrency,
    async (personName): Promise<PersonOutcome> => {
      if (signal?.aborted) return { kind: 'cancelled' };

      let result: VerificationResult;
      let failed = false;
      try {
        const candidates = await retriever.retrieve({
          personName,
          attribute: job.attribute,
          query: params.query(personName),
          topN: params.topN,
          ...(signal && { signal }),
        });
        result = await verifyPerson(
          job,
          { personName, candidates, chunks },
          { ...params.scan, ...(signal && { signal }) }
        );
      } catch (e: unknown) {
        if (e instanceof ScanCancelledError || signal?.aborted) {
          return { kind: 'cancelled' };
        }
        const err = handleUnknownError(e, `Verifying ${personName}`);
        warn(`${job.attribute} scan failed for ${personName}: ${err.message}`);
        result = failedResult(job.attribute, personName, err.message);
        failed = true;
      }

      try {
        params.onResult?.(result);
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Recording ${personName}`);
        warn(`Could not record ${job.attribute} result for ${personName}: ${err.message}`);
        failed = true;
      }
      return { kind: 'done', result, failed };
    }
  );

  const results: VerificationResult[] = [];
  let failures = 0;
  let cancelled = 0;
  for (const outcome of outcomes) {
    if (outcome.kind === 'cancelled') {
      cancelled += 1;
      continue;
    }
    results.push(outcome.result);
    if (outcome.failed) failures += 1;
  }
  return { results, failures, cancelled };
}
