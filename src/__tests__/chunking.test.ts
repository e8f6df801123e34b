/**
 * Tests for the chunk planner
 *
 * Validates:
 * - Audio chunks cover [0, duration] with no gap or overlap
 * - Cuts snap to pauses within tolerance, hard cut otherwise
 * - Text chunks keep whole segments under both budgets
 */

import { describe, it, expect, vi } from 'vitest';

vi.mock('../logger', () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  },
  describeError: (error: unknown) => (error instanceof Error ? error.message : String(error))
}));

import {
  formatTimestamp,
  needsAudioChunking,
  planAudioChunks,
  planTextChunks,
  renderSegmentLine,
  validateChunkSequence
} from '../chunking';
import { PIPELINE_CONFIG } from '../config';
import type { ChunkingConfig } from '../config';
import { UnsplittableInputError } from '../errors';
import { createTimeSpan } from '../types';
import type { Segment } from '../types';
import type { SilenceGap } from '../audio';

const config: ChunkingConfig = { ...PIPELINE_CONFIG.chunking };

function pause(startSeconds: number, endSeconds: number): SilenceGap {
  return { startSeconds, endSeconds, durationSeconds: endSeconds - startSeconds };
}

function segment(start: number, end: number, text: string, speakerId: string | null = 'S'): Segment {
  return { span: createTimeSpan(start, end), text, speakerId, wordConfidence: 0.9, sourceChunk: 0 };
}

describe('chunking', () => {
  describe('planAudioChunks', () => {
    it('should return a single chunk for a 10-minute recording', () => {
      const chunks = planAudioChunks(600, [], config);

      expect(needsAudioChunking(600, config)).toBe(false);
      expect(chunks).toHaveLength(1);
      expect(chunks[0].range).toEqual({ start: 0, end: 600 });
      expect(chunks[0].payload.cutAtPause).toBe(false);
    });

    it('should snap cuts to pauses within the tolerance', () => {
      const chunks = planAudioChunks(4000, [pause(1770, 1772), pause(3560, 3561.5)], config);

      expect(chunks.map(c => [c.range.start, c.range.end])).toEqual([
        [0, 1772],
        [1772, 3561.5],
        [3561.5, 4000]
      ]);
      expect(chunks.map(c => c.payload.cutAtPause)).toEqual([true, true, false]);
    });

    it('should cut at the ceiling when a pause straddles it', () => {
      const chunks = planAudioChunks(2500, [pause(1790, 1810)], config);

      expect(chunks[0].range.end).toBe(1800);
      expect(chunks[0].payload.cutAtPause).toBe(true);
    });

    it('should prefer the pause closest to the ceiling', () => {
      const chunks = planAudioChunks(2500, [pause(1745, 1746), pause(1780, 1781)], config);

      expect(chunks[0].range.end).toBe(1781);
    });

    it('should fall back to a hard cut when no pause is within tolerance', () => {
      const chunks = planAudioChunks(4000, [pause(1700, 1705)], config);

      expect(chunks.map(c => [c.range.start, c.range.end])).toEqual([
        [0, 1800],
        [1800, 3600],
        [3600, 4000]
      ]);
      expect(chunks.every(c => !c.payload.cutAtPause)).toBe(true);
    });

    it('should cover the whole recording for any duration', () => {
      const pauses = [pause(900, 901), pause(1760, 1765), pause(5000, 5002), pause(7150, 7160)];
      for (const duration of [1, 1800, 1800.5, 3599, 3600, 3601, 7200, 10000.25]) {
        const chunks = planAudioChunks(duration, pauses, config);
        const result = validateChunkSequence(chunks, duration);

        expect(result.errors).toEqual([]);
        expect(result.valid).toBe(true);
        chunks.forEach(c => expect(c.range.end - c.range.start).toBeLessThanOrEqual(config.speechCeilingSeconds));
      }
    });

    it('should reject a recording with no audio', () => {
      expect(() => planAudioChunks(0, [], config)).toThrow(UnsplittableInputError);
    });

    it('should reject a tolerance that is not smaller than the ceiling', () => {
      const bad = { ...config, speechCeilingSeconds: 60, pauseToleranceSeconds: 60 };
      expect(() => planAudioChunks(600, [], bad)).toThrow(UnsplittableInputError);
    });
  });

  describe('validateChunkSequence', () => {
    it('should report gaps, overlaps and short coverage', () => {
      const result = validateChunkSequence(
        [
          { index: 0, range: createTimeSpan(0, 10) },
          { index: 1, range: createTimeSpan(12, 20) },
          { index: 2, range: createTimeSpan(19, 30) }
        ],
        40
      );

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Gap between chunk 0 and 1',
        'Overlap between chunk 1 and 2',
        'Last chunk ends at 30, not 40'
      ]);
    });
  });

  describe('text chunks', () => {
    it('should format timestamps as MM:SS', () => {
      expect(formatTimestamp(0)).toBe('00:00');
      expect(formatTimestamp(65.9)).toBe('01:05');
      expect(formatTimestamp(3725)).toBe('62:05');
    });

    it('should render one line per segment', () => {
      expect(renderSegmentLine(segment(65, 70, 'hello there', 'SPEAKER_00'))).toBe('[01:05] SPEAKER_00: hello there');
      expect(renderSegmentLine(segment(1, 2, 'hi', null))).toBe('[00:01] UNKNOWN: hi');
    });

    it('should group segments by count', () => {
      const segments = Array.from({ length: 10 }, (_, i) => segment(i, i + 1, `line ${i}`));
      const chunks = planTextChunks(segments, { ...config, segmentsPerTextChunk: 4 });

      expect(chunks.map(c => c.range)).toEqual([
        { first: 0, last: 3 },
        { first: 4, last: 7 },
        { first: 8, last: 9 }
      ]);
      expect(chunks.map(c => c.index)).toEqual([0, 1, 2]);
      expect(chunks[2].payload).toBe('[00:08] S: line 8\n[00:09] S: line 9');
      expect(chunks[1].span).toEqual({ start: 4, end: 8 });
    });

    it('should close a batch early rather than exceed the context ceiling', () => {
      // Each rendered line is "[00:00] S: aaaa" (15 chars); two lines joined are 31
      const segments = Array.from({ length: 5 }, () => segment(0, 1, 'aaaa'));
      const chunks = planTextChunks(segments, { ...config, llmContextCeilingChars: 31 });

      expect(chunks.map(c => c.range)).toEqual([
        { first: 0, last: 1 },
        { first: 2, last: 3 },
        { first: 4, last: 4 }
      ]);
      chunks.forEach(c => expect(c.payload.length).toBeLessThanOrEqual(31));
    });

    it('should yield one chunk when under both budgets and none for an empty transcript', () => {
      expect(planTextChunks([segment(0, 5, 'short')], config)).toHaveLength(1);
      expect(planTextChunks([], config)).toEqual([]);
    });

    it('should never truncate a segment longer than the ceiling', () => {
      const segments = [segment(0, 5, 'fine'), segment(5, 10, 'this line is far too long')];

      expect(() => planTextChunks(segments, { ...config, llmContextCeilingChars: 20 })).toThrow(UnsplittableInputError);
    });
  });
});
