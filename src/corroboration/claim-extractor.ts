import { ExtractorError, ExtractorTimeoutError, handleUnknownError } from '../errors/index';
import type { Claim } from './types';

export interface ExtractionRequest {
  personName: string;
  text: string;
  signal?: AbortSignal;
}

/*
 * Black-box claim extractor: one chunk in, one parsed claim out.
 * Implementations may throw or hang; the engine bounds every call.
 */
export interface ClaimExtractor<V> {
  extract(request: ExtractionRequest): Promise<Claim<V>>;
}

export type ExtractionOutcome<V> =
  | { ok: true; claim: Claim<V> }
  | { ok: false; error: ExtractorError | ExtractorTimeoutError };

/*
 * Runs one extractor call under a timeout. The call's signal aborts on
 * timeout or when `parentSignal` aborts. Never rejects: a timeout comes back
 * as ExtractorTimeoutError, anything else as ExtractorError for `chunkId`.
 */
export async function extractWithTimeout<V>(
  extractor: ClaimExtractor<V>,
  chunkId: string,
  request: Omit<ExtractionRequest, 'signal'>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<ExtractionOutcome<V>> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new ExtractorTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    const claim = await Promise.race([
      extractor.extract({ ...request, signal: controller.signal }),
      timeout,
    ]);
    return { ok: true, claim };
  } catch (e: unknown) {
    // A hung call rejects from its own abort listener before the timer's reject lands
    const reason: unknown = controller.signal.reason;
    if (reason instanceof ExtractorTimeoutError) {
      return { ok: false, error: reason };
    }
    if (e instanceof ExtractorTimeoutError) {
      return { ok: false, error: e };
    }
    const err = handleUnknownError(e, 'Claim extraction');
    return { ok: false, error: new ExtractorError(err.message, chunkId, e) };
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
