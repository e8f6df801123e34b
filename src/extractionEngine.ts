/**
 * Extraction & Deduplication Engine
 *
 * Runs one LLM extraction call per text chunk, several at a time, and folds
 * every result into a CanonicalKnowledgeSet as it arrives. The set's merge
 * is order-independent, so completion order never changes the output.
 *
 * A chunk that keeps failing contributes nothing and is recorded as a
 * ChunkError; the run carries on.
 */

import { log, describeError } from './logger';
import {
  ChunkTimeoutError,
  MalformedExtractionError,
  PipelineCancelledError,
  sleep,
  withTimeout
} from './errors';
import { CanonicalKnowledgeSet } from './knowledgeSet';
import type { ExtractionService } from './extraction';
import type { ExtractionConfig } from './config';
import type {
  ChunkError,
  ChunkErrorKind,
  ChunkExtraction,
  DocumentInsights,
  KnowledgeSetSnapshot,
  QualityFlag,
  TextChunk
} from './types';

export interface ExtractionRunOptions {
  signal?: AbortSignal;
  onChunkSettled?: (chunkIndex: number, succeeded: boolean) => void | Promise<void>;
}

export interface ExtractionRunResult {
  knowledgeSet: KnowledgeSetSnapshot;
  /** Only when the whole transcript was one chunk */
  documentInsights: DocumentInsights | null;
  errors: ChunkError[];
  completedChunks: number[];
  quarantinedItems: number;
  /** Why documentInsights is null, when it is */
  qualityFlags: QualityFlag[];
  cancelled: boolean;
}

type ChunkOutcome =
  | { ok: true; extraction: ChunkExtraction; attempts: number }
  | { ok: false; error: ChunkError };

function classifyFailure(error: unknown): ChunkErrorKind {
  if (error instanceof PipelineCancelledError) return 'cancelled';
  if (error instanceof ChunkTimeoutError) return 'timeout';
  if (error instanceof MalformedExtractionError) return 'malformed_response';
  return 'extraction_failed';
}

function insightsFlags(chunkCount: number, insights: DocumentInsights | null): QualityFlag[] {
  if (chunkCount === 1) {
    return insights === null
      ? [{
          code: 'document_insights_unavailable',
          message: 'The single text chunk produced no document insights',
          details: { textChunks: 1 }
        }]
      : [];
  }
  return [{
    code: 'document_insights_skipped',
    message: chunkCount === 0
      ? 'Transcript is empty; no document insights requested'
      : `Transcript spans ${chunkCount} text chunks; document insights need it in one`,
    details: { textChunks: chunkCount }
  }];
}

export class ExtractionEngine {
  constructor(
    private readonly service: ExtractionService,
    private readonly config: ExtractionConfig
  ) {}

  async run(chunks: TextChunk[], options: ExtractionRunOptions = {}): Promise<ExtractionRunResult> {
    const { signal, onChunkSettled } = options;
    const knowledgeSet = new CanonicalKnowledgeSet(this.config);
    const includeDocumentInsights = chunks.length === 1;
    const errors: ChunkError[] = [];
    const completedChunks: number[] = [];
    let documentInsights: DocumentInsights | null = null;
    let quarantinedItems = 0;
    let next = 0;

    log.info('[ExtractionEngine] Starting extraction', {
      chunks: chunks.length,
      concurrency: this.config.extractionConcurrency,
      includeDocumentInsights
    });

    const worker = async (): Promise<void> => {
      while (next < chunks.length) {
        const chunk = chunks[next++];

        if (signal?.aborted) {
          errors.push(this.cancelledError(chunk.index, 0));
          continue;
        }

        const outcome = await this.extractChunk(chunk, chunks.length, includeDocumentInsights, signal);
        if (outcome.ok) {
          knowledgeSet.mergeExtraction(outcome.extraction);
          quarantinedItems += outcome.extraction.quarantined;
          completedChunks.push(chunk.index);
          if (includeDocumentInsights) {
            documentInsights = outcome.extraction.insights;
          }
        } else {
          errors.push(outcome.error);
        }
        if (!outcome.ok && outcome.error.kind === 'cancelled') {
          continue;
        }
        await onChunkSettled?.(chunk.index, outcome.ok);
      }
    };

    const workerCount = Math.min(this.config.extractionConcurrency, chunks.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    errors.sort((a, b) => a.chunkIndex - b.chunkIndex);
    completedChunks.sort((a, b) => a - b);
    const snapshot = knowledgeSet.snapshot();
    const cancelled = errors.some(e => e.kind === 'cancelled');
    const qualityFlags = insightsFlags(chunks.length, documentInsights);

    log.info('[ExtractionEngine] Extraction complete', {
      chunks: chunks.length,
      completed: completedChunks.length,
      failed: errors.length,
      entities: snapshot.entities.length,
      relationships: snapshot.relationships.length,
      quarantinedItems,
      cancelled
    });

    return {
      knowledgeSet: snapshot,
      documentInsights,
      errors,
      completedChunks,
      quarantinedItems,
      qualityFlags,
      cancelled
    };
  }

  /**
   * Call the service with a fixed retry budget. Never throws.
   */
  private async extractChunk(
    chunk: TextChunk,
    totalChunks: number,
    includeDocumentInsights: boolean,
    signal?: AbortSignal
  ): Promise<ChunkOutcome> {
    const maxAttempts = this.config.maxExtractionAttempts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const extraction = await withTimeout(
          callSignal => this.service.extract({
            text: chunk.payload,
            chunkIndex: chunk.index,
            totalChunks,
            includeDocumentInsights,
            signal: callSignal
          }),
          this.config.extractionTimeoutMs,
          `extraction chunk ${chunk.index}`,
          signal
        );
        return { ok: true, extraction, attempts: attempt };
      } catch (error) {
        const kind = classifyFailure(error);
        if (kind === 'cancelled') {
          return { ok: false, error: this.cancelledError(chunk.index, attempt) };
        }

        if (attempt >= maxAttempts) {
          log.error('[ExtractionEngine] Chunk failed permanently', {
            chunkIndex: chunk.index,
            attempts: attempt,
            kind,
            error: describeError(error)
          });
          return {
            ok: false,
            error: {
              stage: 'extraction',
              chunkIndex: chunk.index,
              kind,
              message: describeError(error),
              attempts: attempt
            }
          };
        }

        log.warn('[ExtractionEngine] Extraction attempt failed, retrying', {
          chunkIndex: chunk.index,
          attempt,
          maxAttempts,
          kind,
          delayMs: this.config.extractionRetryDelayMs,
          error: describeError(error)
        });

        try {
          await sleep(this.config.extractionRetryDelayMs, signal);
        } catch (sleepError) {
          if (sleepError instanceof PipelineCancelledError) {
            return { ok: false, error: this.cancelledError(chunk.index, attempt) };
          }
          throw sleepError;
        }
      }
    }

    // maxAttempts is validated as positive, so the loop always returns
    return {
      ok: false,
      error: {
        stage: 'extraction',
        chunkIndex: chunk.index,
        kind: 'extraction_failed',
        message: 'No extraction attempt was made',
        attempts: 0
      }
    };
  }

  private cancelledError(chunkIndex: number, attempts: number): ChunkError {
    return {
      stage: 'extraction',
      chunkIndex,
      kind: 'cancelled',
      message: 'Run cancelled before this chunk completed',
      attempts
    };
  }
}
