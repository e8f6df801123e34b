/**
 * Chunk Planner
 *
 * Splits a recording into windows the external models can take in one call.
 *
 * Audio side: the speech model has a hard per-call duration ceiling. Long
 * recordings are cut as close to the ceiling as possible, snapping back to
 * the nearest detected pause within a tolerance so no word is cut in half,
 * and falling back to a hard cut at the ceiling.
 *
 * Text side: the LLM has a soft context ceiling. Transcribed segments are
 * grouped into fixed-size batches by segment count so every chunk carries
 * whole utterances. A batch closes early rather than exceed the ceiling.
 *
 * Content is never truncated: input that cannot fit is a fatal error.
 */

import { log } from './logger';
import { UnsplittableInputError } from './errors';
import { createTimeSpan } from './types';
import type { AudioChunk, Segment, TextChunk, TimeSpan } from './types';
import type { ChunkingConfig } from './config';
import type { SilenceGap } from './audio';

// =============================================================================
// Audio Chunks
// =============================================================================

/**
 * Whether a recording of this length needs more than one speech-model call.
 */
export function needsAudioChunking(totalDurationSeconds: number, config: ChunkingConfig): boolean {
  return totalDurationSeconds > config.speechCeilingSeconds;
}

/**
 * Plan audio chunks covering [0, totalDurationSeconds] with no gap and no
 * overlap.
 *
 * For each cut the target is `start + speechCeilingSeconds`. Among pauses
 * that reach into [target - tolerance, target], the cut lands at the point
 * of the pause closest to the target (the pause end, or the target itself
 * when the pause straddles it). Without such a pause the cut is hard.
 *
 * @throws UnsplittableInputError for an empty recording or budgets that
 *   cannot make progress
 */
export function planAudioChunks(
  totalDurationSeconds: number,
  pauses: SilenceGap[],
  config: ChunkingConfig
): AudioChunk[] {
  const ceiling = config.speechCeilingSeconds;
  const tolerance = config.pauseToleranceSeconds;

  if (!Number.isFinite(totalDurationSeconds) || totalDurationSeconds <= 0) {
    throw new UnsplittableInputError(`Recording has no audio (duration ${totalDurationSeconds}s)`, {
      totalDurationSeconds
    });
  }
  if (!(ceiling > 0) || tolerance < 0 || tolerance >= ceiling) {
    throw new UnsplittableInputError('Speech ceiling and pause tolerance cannot make progress', {
      speechCeilingSeconds: ceiling,
      pauseToleranceSeconds: tolerance
    });
  }

  if (!needsAudioChunking(totalDurationSeconds, config)) {
    return [{
      index: 0,
      range: createTimeSpan(0, totalDurationSeconds),
      payload: { cutAtPause: false }
    }];
  }

  const sortedPauses = [...pauses].sort((a, b) => a.startSeconds - b.startSeconds);
  const chunks: AudioChunk[] = [];
  let start = 0;

  while (totalDurationSeconds - start > ceiling) {
    const target = start + ceiling;
    const cut = findPauseCut(sortedPauses, target, tolerance, start);

    chunks.push({
      index: chunks.length,
      range: createTimeSpan(start, cut ?? target),
      payload: { cutAtPause: cut !== null }
    });

    if (cut === null) {
      log.warn('[Chunking] No pause within tolerance, hard cut at ceiling', {
        chunkIndex: chunks.length - 1,
        cutSeconds: target
      });
    }

    start = cut ?? target;
  }

  chunks.push({
    index: chunks.length,
    range: createTimeSpan(start, totalDurationSeconds),
    payload: { cutAtPause: false }
  });

  log.info('[Chunking] Planned audio chunks', {
    totalDurationSeconds,
    chunkCount: chunks.length,
    pauseCuts: chunks.filter(c => c.payload.cutAtPause).length
  });

  return chunks;
}

function findPauseCut(
  pauses: SilenceGap[],
  target: number,
  tolerance: number,
  chunkStart: number
): number | null {
  let best: number | null = null;

  for (const pause of pauses) {
    if (pause.startSeconds > target) {
      break;
    }
    const cut = Math.min(pause.endSeconds, target);
    if (cut < target - tolerance || cut <= chunkStart) {
      continue;
    }
    if (best === null || cut > best) {
      best = cut;
    }
  }

  return best;
}

// =============================================================================
// Text Chunks
// =============================================================================

/**
 * Format seconds as MM:SS (minutes keep counting past an hour).
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.floor(seconds);
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
}

/**
 * The line a segment contributes to an LLM prompt.
 */
export function renderSegmentLine(segment: Segment): string {
  return `[${formatTimestamp(segment.span.start)}] ${segment.speakerId ?? 'UNKNOWN'}: ${segment.text}`;
}

/**
 * Group ordered segments into text chunks.
 *
 * @throws UnsplittableInputError if one segment alone exceeds the context
 *   ceiling
 */
export function planTextChunks(segments: Segment[], config: ChunkingConfig): TextChunk[] {
  const ceiling = config.llmContextCeilingChars;
  const chunks: TextChunk[] = [];

  let batchStart = 0;
  let lines: string[] = [];
  let chars = 0;

  const flush = (endIndex: number): void => {
    if (lines.length === 0) {
      return;
    }
    const batch = segments.slice(batchStart, endIndex + 1);
    chunks.push({
      index: chunks.length,
      range: { first: batchStart, last: endIndex },
      payload: lines.join('\n'),
      span: createTimeSpan(batch[0].span.start, Math.max(...batch.map(s => s.span.end)))
    });
    lines = [];
    chars = 0;
  };

  segments.forEach((segment, i) => {
    const line = renderSegmentLine(segment);
    if (line.length > ceiling) {
      throw new UnsplittableInputError(
        `Segment ${i} (${line.length} chars) exceeds the LLM context ceiling of ${ceiling} chars`,
        { segmentIndex: i, segmentChars: line.length, llmContextCeilingChars: ceiling }
      );
    }

    const joinedChars = chars + (lines.length > 0 ? 1 : 0) + line.length;
    if (lines.length >= config.segmentsPerTextChunk || joinedChars > ceiling) {
      flush(i - 1);
      batchStart = i;
    }

    chars = chars + (lines.length > 0 ? 1 : 0) + line.length;
    lines.push(line);
  });

  flush(segments.length - 1);

  log.info('[Chunking] Planned text chunks', {
    segmentCount: segments.length,
    chunkCount: chunks.length,
    segmentsPerTextChunk: config.segmentsPerTextChunk
  });

  return chunks;
}

// =============================================================================
// Validation
// =============================================================================

export interface ChunkValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check that chunk ranges tile [0, total] exactly, in index order.
 */
export function validateChunkSequence(
  chunks: Array<{ index: number; range: TimeSpan }>,
  totalDurationSeconds: number
): ChunkValidationResult {
  const errors: string[] = [];

  if (chunks.length === 0) {
    return { valid: false, errors: ['Empty chunk sequence'] };
  }

  chunks.forEach((chunk, position) => {
    if (chunk.index !== position) {
      errors.push(`Chunk at position ${position} has index ${chunk.index}`);
    }
    if (position > 0) {
      const previous = chunks[position - 1];
      if (chunk.range.start > previous.range.end) {
        errors.push(`Gap between chunk ${previous.index} and ${chunk.index}`);
      } else if (chunk.range.start < previous.range.end) {
        errors.push(`Overlap between chunk ${previous.index} and ${chunk.index}`);
      }
    }
  });

  if (chunks[0].range.start !== 0) {
    errors.push(`First chunk starts at ${chunks[0].range.start}, not 0`);
  }
  const lastEnd = chunks[chunks.length - 1].range.end;
  if (lastEnd !== totalDurationSeconds) {
    errors.push(`Last chunk ends at ${lastEnd}, not ${totalDurationSeconds}`);
  }

  return { valid: errors.length === 0, errors };
}
