/**
 * Per-call timeout for adapter operations
 *
 * @module pipeline/timeout
 */

import { AdapterTimeoutError, PipelineCancelledError } from './errors.js';

/**
 * Run `fn` with a deadline. The signal handed to `fn` aborts when the
 * deadline passes or when `parent` aborts, so adapters can stop their
 * in-flight request.
 *
 * @throws AdapterTimeoutError when the deadline passes first
 * @throws PipelineCancelledError when `parent` aborts first
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;

  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) {
    throw new PipelineCancelledError(`${operation} cancelled`);
  }
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(new AdapterTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } catch (error) {
    if (timedOut) throw new AdapterTimeoutError(operation, timeoutMs);
    if (parent?.aborted) throw new PipelineCancelledError(`${operation} cancelled`);
    throw error;
  } finally {
    clearTimeout(timeoutId);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
