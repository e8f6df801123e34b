/**
 * Pipeline error taxonomy
 *
 * Four failure classes with different propagation rules:
 * 1. Unsplittable input - fatal, never retried
 * 2. Resource exhaustion - degraded retry, then per-chunk permanent failure
 * 3. Extraction call failure - fixed retry, then per-chunk permanent failure
 * 4. Quality degradation - not an error at all, surfaced as a QualityFlag
 *
 * Per-chunk failures are recorded and recovered locally; only configuration
 * and unsplittable-input errors escape a run.
 */

import type { ChunkErrorKind } from './types';

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/**
 * Invalid or contradictory pipeline configuration.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input that cannot be split into chunks under the configured budgets,
 * e.g. a single utterance longer than the model context. Never truncated.
 */
export class UnsplittableInputError extends PipelineError {
  constructor(message: string, public readonly details: Record<string, number> = {}) {
    super(message);
    this.name = 'UnsplittableInputError';
  }
}

/**
 * The speech model ran out of a compute resource (typically GPU memory).
 * Retrying with a smaller batch can succeed where retrying as-is cannot.
 */
export class ResourceExhaustedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceExhaustedError';
  }
}

export class ChunkTimeoutError extends PipelineError {
  constructor(public readonly label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'ChunkTimeoutError';
  }
}

/**
 * The LLM extraction service failed for one chunk (network, quota, 5xx).
 */
export class ExtractionCallError extends PipelineError {
  constructor(message: string, public readonly chunkIndex: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionCallError';
  }
}

/**
 * The LLM answered, but the payload is empty or does not match the schema.
 */
export class MalformedExtractionError extends ExtractionCallError {
  constructor(message: string, chunkIndex: number, public readonly preview: string) {
    super(message, chunkIndex);
    this.name = 'MalformedExtractionError';
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(label: string) {
    super(`${label} cancelled`);
    this.name = 'PipelineCancelledError';
  }
}

/**
 * A chunk that failed permanently after its retry budget was spent.
 */
export class ChunkFailureError extends PipelineError {
  constructor(
    message: string,
    public readonly chunkIndex: number,
    public readonly kind: ChunkErrorKind,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChunkFailureError';
  }
}

/**
 * Run an abortable operation with a deadline.
 *
 * The operation receives its own AbortSignal which fires when the deadline
 * passes or the parent signal aborts. Rejects with ChunkTimeoutError or
 * PipelineCancelledError respectively.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(new PipelineCancelledError(label));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const finish = (): void => {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
    };

    const onParentAbort = (): void => {
      finish();
      controller.abort();
      reject(new PipelineCancelledError(label));
    };

    const timer = setTimeout(() => {
      finish();
      controller.abort();
      reject(new ChunkTimeoutError(label, timeoutMs));
    }, timeoutMs);

    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      finish();
      reject(error);
      return;
    }

    pending.then(
      value => {
        finish();
        resolve(value);
      },
      (error: unknown) => {
        finish();
        reject(error);
      }
    );
  });
}

/**
 * Wait for `ms` unless the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new PipelineCancelledError('wait'));
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new PipelineCancelledError('wait'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
