import { describe, it, expect, vi } from 'vitest';

vi.mock('@ffmpeg-installer/ffmpeg', () => ({
  default: { path: '/opt/ffmpeg/ffmpeg' }
}));

vi.mock('../logger', () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  },
  describeError: (error: unknown) => (error instanceof Error ? error.message : String(error))
}));

import { parseDurationLine, parseSilenceDetectOutput } from '../audio';

describe('audio', () => {
  describe('parseSilenceDetectOutput', () => {
    it('should pair silence starts with ends', () => {
      const stderr = [
        '[silencedetect @ 0x7f] silence_start: 10.25',
        '[silencedetect @ 0x7f] silence_end: 11 | silence_duration: 0.75',
        'size=N/A time=00:00:30.00 bitrate=N/A speed= 500x',
        '[silencedetect @ 0x7f] silence_start: 20.5',
        '[silencedetect @ 0x7f] silence_end: 22.5 | silence_duration: 2'
      ].join('\n');

      expect(parseSilenceDetectOutput(stderr)).toEqual([
        { startSeconds: 10.25, endSeconds: 11, durationSeconds: 0.75 },
        { startSeconds: 20.5, endSeconds: 22.5, durationSeconds: 2 }
      ]);
    });

    it('should clamp a negative leading start to zero', () => {
      const stderr = 'silence_start: -0.01\nsilence_end: 1.5 | silence_duration: 1.51';

      expect(parseSilenceDetectOutput(stderr)).toEqual([
        { startSeconds: 0, endSeconds: 1.5, durationSeconds: 1.5 }
      ]);
    });

    it('should ignore a trailing start without an end', () => {
      const stderr = 'silence_start: 3\nsilence_end: 4 | silence_duration: 1\nsilence_start: 9';

      expect(parseSilenceDetectOutput(stderr)).toHaveLength(1);
    });

    it('should return nothing for output without silence', () => {
      expect(parseSilenceDetectOutput('Stream #0:0: Audio: mp3')).toEqual([]);
    });
  });

  describe('parseDurationLine', () => {
    it('should read the input duration banner', () => {
      expect(parseDurationLine('  Duration: 01:02:03.50, start: 0.000000, bitrate: 128 kb/s')).toBe(3723.5);
    });

    it('should return null without a duration line', () => {
      expect(parseDurationLine('No such file or directory')).toBeNull();
    });
  });
});
