/**
 * Transcription/Diarization Orchestrator
 *
 * Turns audio chunks into ordered raw segments on the recording timeline.
 *
 * Per chunk:
 * 1. Acquire the worker's speech model (loaded once, see SpeechModelHandle)
 * 2. Transcribe + align + diarize in one model call
 * 3. Merge word-level speaker labels onto each utterance
 * 4. Shift chunk-local timestamps onto the recording timeline
 *
 * GPU memory exhaustion is retried with a strictly smaller batch size each
 * time (16 -> 8 -> 4 by default); a timed-out call counts as exhaustion.
 * Once the attempt cap is reached the chunk fails permanently and the
 * remaining chunks carry on.
 *
 * Chunks of one recording run sequentially: the GPU is the bottleneck.
 */

import { log, describeError } from './logger';
import {
  ChunkFailureError,
  ChunkTimeoutError,
  PipelineCancelledError,
  ResourceExhaustedError,
  withTimeout
} from './errors';
import { createTimeSpan } from './types';
import type { AudioChunk, ChunkError, QualityFlag, RetryEvent, Segment } from './types';
import type { TranscriptionConfig } from './config';
import type { RawUtterance, SpeechModelHandle } from './speechModel';

export type ChunkAudioLoader = (chunk: AudioChunk, signal?: AbortSignal) => Promise<Buffer>;

export interface ChunkTranscription {
  chunkIndex: number;
  segments: Segment[];
  attempts: number;
  batchSize: number;
  retryEvents: RetryEvent[];
}

export interface LanguageDetection {
  language: string | null;
  /** One entry per sampled chunk, null where detection failed */
  samples: Array<{ chunkIndex: number; language: string | null }>;
}

export interface RecordingTranscription {
  segments: Segment[];
  language: string | null;
  errors: ChunkError[];
  retryEvents: RetryEvent[];
  completedChunks: number[];
  qualityFlags: QualityFlag[];
  cancelled: boolean;
}

export interface TranscribeRecordingOptions {
  signal?: AbortSignal;
  onChunkSettled?: (chunkIndex: number, succeeded: boolean) => void | Promise<void>;
}

/**
 * Strictly decreasing batch sizes, one per allowed attempt.
 * Stops early when halving can no longer go below the floor.
 */
export function batchSizeSchedule(config: TranscriptionConfig): number[] {
  const schedule = [config.initialBatchSize];
  while (schedule.length < config.maxTranscriptionAttempts) {
    const previous = schedule[schedule.length - 1];
    const next = Math.max(config.minBatchSize, Math.floor(previous / 2));
    if (next >= previous) {
      break;
    }
    schedule.push(next);
  }
  return schedule;
}

/**
 * Speaker for an utterance from its word-level labels: the label covering the
 * most word time (word count when words lack timing). Falls back to the
 * utterance label.
 */
export function assignUtteranceSpeaker(utterance: RawUtterance): string | null {
  const weights = new Map<string, number>();

  for (const word of utterance.words ?? []) {
    if (!word.speaker) {
      continue;
    }
    const hasTiming = word.start !== undefined && word.end !== undefined && word.end > word.start;
    const weight = hasTiming && word.start !== undefined && word.end !== undefined
      ? word.end - word.start
      : 1e-3;
    weights.set(word.speaker, (weights.get(word.speaker) ?? 0) + weight);
  }

  let best: string | null = null;
  let bestWeight = -1;
  // Sorted so equal weights resolve the same way on every run
  for (const speaker of [...weights.keys()].sort()) {
    const weight = weights.get(speaker) ?? 0;
    if (weight > bestWeight) {
      best = speaker;
      bestWeight = weight;
    }
  }

  return best ?? utterance.speaker ?? null;
}

function utteranceConfidence(utterance: RawUtterance): number {
  const scores = (utterance.words ?? [])
    .map(w => w.score)
    .filter((score): score is number => typeof score === 'number' && Number.isFinite(score));
  if (scores.length > 0) {
    return scores.reduce((sum, score) => sum + score, 0) / scores.length;
  }
  return typeof utterance.confidence === 'number' ? utterance.confidence : 0;
}

/**
 * Convert model utterances to segments on the recording timeline, clamped to
 * the chunk's range and ordered by start.
 */
export function toRecordingSegments(utterances: RawUtterance[], chunk: AudioChunk): Segment[] {
  const offset = chunk.range.start;
  const segments: Segment[] = [];

  for (const utterance of utterances) {
    const text = utterance.text.trim();
    const start = Math.max(chunk.range.start, offset + utterance.start);
    const end = Math.min(chunk.range.end, offset + utterance.end);
    if (!text || !Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
      continue;
    }
    segments.push({
      span: createTimeSpan(start, end),
      text,
      speakerId: assignUtteranceSpeaker(utterance),
      wordConfidence: Math.min(1, Math.max(0, utteranceConfidence(utterance))),
      sourceChunk: chunk.index
    });
  }

  return segments.sort((a, b) => a.span.start - b.span.start);
}

export class TranscriptionOrchestrator {
  constructor(
    private readonly modelHandle: SpeechModelHandle,
    private readonly config: TranscriptionConfig
  ) {}

  /**
   * Detect the recording language from a sample of chunks.
   *
   * Samples are spread evenly over the recording and the majority answer is
   * applied to every chunk. This assumes one dominant language per recording.
   */
  async detectRecordingLanguage(
    chunks: AudioChunk[],
    loadAudio: ChunkAudioLoader,
    signal?: AbortSignal
  ): Promise<LanguageDetection> {
    if (this.config.languageHint) {
      return { language: this.config.languageHint, samples: [] };
    }

    const model = await this.modelHandle.acquire();
    const samples: LanguageDetection['samples'] = [];

    for (const chunk of sampleChunks(chunks, this.config.languageSampleChunks)) {
      if (signal?.aborted) {
        break;
      }
      try {
        const audio = await loadAudio(chunk, signal);
        const language = await withTimeout(
          sampleSignal => model.detectLanguage(audio, sampleSignal),
          this.config.transcriptionTimeoutMs,
          `language detection chunk ${chunk.index}`,
          signal
        );
        samples.push({ chunkIndex: chunk.index, language });
      } catch (error) {
        if (error instanceof PipelineCancelledError) {
          break;
        }
        log.warn('[Transcribe] Language detection failed for sample', {
          chunkIndex: chunk.index,
          error: describeError(error)
        });
        samples.push({ chunkIndex: chunk.index, language: null });
      }
    }

    const language = majorityLanguage(samples);
    log.info('[Transcribe] Recording language', { language, samples });
    return { language, samples };
  }

  /**
   * Transcribe one chunk with the cascading batch-size fallback.
   *
   * @throws ChunkFailureError once the chunk has failed permanently
   * @throws PipelineCancelledError when the run is cancelled
   */
  async transcribeChunk(
    chunk: AudioChunk,
    audio: Buffer,
    language: string | null,
    signal?: AbortSignal
  ): Promise<ChunkTranscription> {
    const model = await this.modelHandle.acquire();
    const schedule = batchSizeSchedule(this.config);
    const retryEvents: RetryEvent[] = [];

    for (let attempt = 1; attempt <= schedule.length; attempt++) {
      const batchSize = schedule[attempt - 1];
      try {
        const result = await withTimeout(
          callSignal => model.transcribe(audio, { languageHint: language, batchSize, signal: callSignal }),
          this.config.transcriptionTimeoutMs,
          `transcription chunk ${chunk.index}`,
          signal
        );

        const segments = toRecordingSegments(result.utterances, chunk);
        log.info('[Transcribe] Chunk transcribed', {
          chunkIndex: chunk.index,
          segments: segments.length,
          attempt,
          batchSize
        });
        return { chunkIndex: chunk.index, segments, attempts: attempt, batchSize, retryEvents };
      } catch (error) {
        if (error instanceof PipelineCancelledError) {
          throw error;
        }

        const exhausted = error instanceof ResourceExhaustedError;
        const timedOut = error instanceof ChunkTimeoutError;
        if (!exhausted && !timedOut) {
          throw new ChunkFailureError(
            `Speech model failed on chunk ${chunk.index}: ${describeError(error)}`,
            chunk.index,
            'model_error',
            attempt,
            { cause: error }
          );
        }

        const nextBatchSize = schedule[attempt];
        if (nextBatchSize === undefined) {
          throw new ChunkFailureError(
            `Chunk ${chunk.index} failed after ${attempt} attempts: ${describeError(error)}`,
            chunk.index,
            timedOut ? 'timeout' : 'resource_exhausted',
            attempt,
            { cause: error }
          );
        }

        const event: RetryEvent = {
          chunkIndex: chunk.index,
          attempt,
          previousBatchSize: batchSize,
          nextBatchSize,
          reason: timedOut ? 'timeout' : 'resource_exhausted',
          message: describeError(error)
        };
        retryEvents.push(event);
        log.warn('[Transcribe] Retrying chunk with smaller batch', { ...event });
      }
    }

    // Unreachable: schedule always has at least one entry and every path
    // through the loop returns or throws
    throw new ChunkFailureError(`Chunk ${chunk.index} was never attempted`, chunk.index, 'model_error', 0);
  }

  /**
   * Transcribe every chunk of a recording in order.
   *
   * A chunk that fails permanently is recorded and skipped; cancellation
   * marks the remaining chunks as cancelled and keeps what finished.
   */
  async transcribeRecording(
    chunks: AudioChunk[],
    loadAudio: ChunkAudioLoader,
    options: TranscribeRecordingOptions = {}
  ): Promise<RecordingTranscription> {
    const { signal, onChunkSettled } = options;
    const segments: Segment[] = [];
    const errors: ChunkError[] = [];
    const retryEvents: RetryEvent[] = [];
    const completedChunks: number[] = [];
    const qualityFlags: QualityFlag[] = [];
    let cancelled = false;

    const detection = await this.detectRecordingLanguage(chunks, loadAudio, signal);
    if (!this.config.languageHint && detection.language === null && detection.samples.length > 0) {
      qualityFlags.push({
        code: 'language_detection_failed',
        message: 'No sampled chunk produced a language; transcribing without a language hint',
        details: { samples: detection.samples.length }
      });
    }

    for (const chunk of chunks) {
      if (cancelled || signal?.aborted) {
        cancelled = true;
        errors.push(cancelledError(chunk.index, 0));
        continue;
      }

      let audio: Buffer;
      try {
        audio = await loadAudio(chunk, signal);
      } catch (error) {
        log.error('[Transcribe] Could not load chunk audio', {
          chunkIndex: chunk.index,
          error: describeError(error)
        });
        errors.push({
          stage: 'transcription',
          chunkIndex: chunk.index,
          kind: 'audio_unavailable',
          message: describeError(error),
          attempts: 0
        });
        await onChunkSettled?.(chunk.index, false);
        continue;
      }

      try {
        const result = await this.transcribeChunk(chunk, audio, detection.language, signal);
        segments.push(...result.segments);
        retryEvents.push(...result.retryEvents);
        completedChunks.push(chunk.index);
        await onChunkSettled?.(chunk.index, true);
      } catch (error) {
        if (error instanceof PipelineCancelledError) {
          cancelled = true;
          errors.push(cancelledError(chunk.index, 1));
          continue;
        }
        if (error instanceof ChunkFailureError) {
          log.error('[Transcribe] Chunk failed permanently', {
            chunkIndex: chunk.index,
            kind: error.kind,
            attempts: error.attempts,
            error: error.message
          });
          errors.push({
            stage: 'transcription',
            chunkIndex: chunk.index,
            kind: error.kind,
            message: error.message,
            attempts: error.attempts
          });
          await onChunkSettled?.(chunk.index, false);
          continue;
        }
        throw error;
      }
    }

    // Chunks are disjoint and processed in order; the sort only settles
    // utterances that share a start time across a boundary
    segments.sort((a, b) => a.span.start - b.span.start);

    log.info('[Transcribe] Recording transcribed', {
      chunks: chunks.length,
      completed: completedChunks.length,
      failed: errors.length,
      segments: segments.length,
      retries: retryEvents.length,
      cancelled
    });

    return {
      segments,
      language: detection.language,
      errors,
      retryEvents,
      completedChunks,
      qualityFlags,
      cancelled
    };
  }
}

function cancelledError(chunkIndex: number, attempts: number): ChunkError {
  return {
    stage: 'transcription',
    chunkIndex,
    kind: 'cancelled',
    message: 'Run cancelled before this chunk completed',
    attempts
  };
}

/**
 * Pick up to `count` chunks spread evenly from first to last.
 */
export function sampleChunks<T>(chunks: T[], count: number): T[] {
  if (chunks.length <= count) {
    return [...chunks];
  }
  if (count === 1) {
    return [chunks[0]];
  }
  const picked = new Set<number>();
  for (let i = 0; i < count; i++) {
    picked.add(Math.round((i * (chunks.length - 1)) / (count - 1)));
  }
  return [...picked].sort((a, b) => a - b).map(i => chunks[i]);
}

/**
 * Most frequent detected language; ties go to the earliest sample.
 */
export function majorityLanguage(samples: LanguageDetection['samples']): string | null {
  const counts = new Map<string, number>();
  for (const sample of samples) {
    if (sample.language) {
      counts.set(sample.language, (counts.get(sample.language) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const sample of samples) {
    if (!sample.language) {
      continue;
    }
    const count = counts.get(sample.language) ?? 0;
    if (count > bestCount) {
      best = sample.language;
      bestCount = count;
    }
  }
  return best;
}
