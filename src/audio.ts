/**
 * Audio Toolkit
 *
 * ffmpeg-backed helpers the pipeline needs from the raw recording:
 * duration probing, pause (silence) detection for chunk boundaries, and
 * extraction of a single time range as an in-memory buffer.
 *
 * The pipeline depends on the AudioToolkit interface, not on ffmpeg, so tests
 * can run without any audio tooling installed.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg';
import { log, describeError } from './logger';
import type { TimeSpan } from './types';

const execFileAsync = promisify(execFile);

/**
 * A silence interval detected in the audio.
 */
export interface SilenceGap {
  startSeconds: number;
  endSeconds: number;
  durationSeconds: number;
}

export interface SilenceDetectionOptions {
  thresholdDb: number;
  minDurationSeconds: number;
}

export interface AudioToolkit {
  getDuration(audioFilePath: string): Promise<number>;
  detectPauses(audioFilePath: string, options: SilenceDetectionOptions): Promise<SilenceGap[]>;
  extractRange(audioFilePath: string, span: TimeSpan): Promise<Buffer>;
}

// =============================================================================
// Silence Detection
// =============================================================================

/**
 * Detect silence gaps using ffmpeg's silencedetect filter.
 *
 * Runs: ffmpeg -i <file> -af silencedetect=n=-30dB:d=0.5 -f null -
 */
export async function detectSilenceGaps(
  audioFilePath: string,
  options: SilenceDetectionOptions
): Promise<SilenceGap[]> {
  log.info('[Audio] Detecting silence gaps', { audioFilePath, ...options });

  const filterArg = `silencedetect=n=${options.thresholdDb}dB:d=${options.minDurationSeconds}`;

  try {
    // silencedetect reports on stderr; -f null discards the decoded output
    const { stderr } = await execFileAsync(ffmpegInstaller.path, [
      '-i', audioFilePath,
      '-af', filterArg,
      '-f', 'null',
      '-'
    ], {
      maxBuffer: 10 * 1024 * 1024
    });

    const gaps = parseSilenceDetectOutput(stderr);
    log.info('[Audio] Silence detection complete', {
      gapsFound: gaps.length,
      firstGap: gaps[0] ?? null,
      lastGap: gaps[gaps.length - 1] ?? null
    });
    return gaps;
  } catch (error) {
    // ffmpeg exits non-zero for some containers but still prints the filter log
    const stderr = readStderr(error);
    if (stderr) {
      const gaps = parseSilenceDetectOutput(stderr);
      if (gaps.length > 0) {
        log.warn('[Audio] Recovered silence gaps despite ffmpeg exit code', { gapsFound: gaps.length });
        return gaps;
      }
    }
    throw new Error(`Silence detection failed: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Parse ffmpeg silencedetect output.
 *
 *   [silencedetect @ 0x...] silence_start: 10.234
 *   [silencedetect @ 0x...] silence_end: 10.789 | silence_duration: 0.555
 */
export function parseSilenceDetectOutput(stderr: string): SilenceGap[] {
  const starts = [...stderr.matchAll(/silence_start:\s*(-?[\d.]+)/g)].map(m => parseFloat(m[1]));
  const ends = [...stderr.matchAll(/silence_end:\s*([\d.]+)/g)].map(m => parseFloat(m[1]));

  const gaps: SilenceGap[] = [];
  const pairCount = Math.min(starts.length, ends.length);
  for (let i = 0; i < pairCount; i++) {
    // silencedetect can report a slightly negative start for leading silence
    const startSeconds = Math.max(0, starts[i]);
    const endSeconds = ends[i];
    if (endSeconds > startSeconds) {
      gaps.push({ startSeconds, endSeconds, durationSeconds: endSeconds - startSeconds });
    }
  }

  return gaps.sort((a, b) => a.startSeconds - b.startSeconds);
}

// =============================================================================
// Duration
// =============================================================================

/**
 * Total duration of an audio file in seconds (ffprobe, falling back to the
 * Duration line ffmpeg prints for its input).
 */
export async function getAudioDuration(audioFilePath: string): Promise<number> {
  const ffmpegPath = ffmpegInstaller.path;
  const ffprobePath = ffmpegPath.replace(/ffmpeg$/, 'ffprobe');

  try {
    const { stdout } = await execFileAsync(ffprobePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      audioFilePath
    ]);
    const duration = parseFloat(stdout.trim());
    if (isNaN(duration)) {
      throw new Error(`Invalid duration value: ${stdout}`);
    }
    return duration;
  } catch (probeError) {
    log.warn('[Audio] ffprobe failed, falling back to ffmpeg duration', { error: describeError(probeError) });

    const stderr = await ffmpegInfo(audioFilePath);
    const duration = parseDurationLine(stderr);
    if (duration === null) {
      throw new Error(`Failed to get audio duration: ${describeError(probeError)}`, { cause: probeError });
    }
    return duration;
  }
}

/**
 * Parse "Duration: HH:MM:SS.ss" from ffmpeg's input banner.
 */
export function parseDurationLine(stderr: string): number | null {
  const match = /Duration: (\d+):(\d+):(\d+\.?\d*)/.exec(stderr);
  if (!match) {
    return null;
  }
  return parseInt(match[1], 10) * 3600 + parseInt(match[2], 10) * 60 + parseFloat(match[3]);
}

async function ffmpegInfo(audioFilePath: string): Promise<string> {
  try {
    const { stderr } = await execFileAsync(ffmpegInstaller.path, ['-i', audioFilePath], {
      maxBuffer: 1024 * 1024
    });
    return stderr;
  } catch (error) {
    // No output file given, so ffmpeg always exits non-zero here
    return readStderr(error) ?? '';
  }
}

// =============================================================================
// Range Extraction
// =============================================================================

/**
 * Extract [span.start, span.end) of the recording as a buffer.
 *
 * Tries a stream copy first and re-encodes to MP3 when the codec cannot be
 * cut without decoding.
 */
export async function extractAudioRange(audioFilePath: string, span: TimeSpan): Promise<Buffer> {
  const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'audio-range-'));
  const outputPath = path.join(tempDir, `range${path.extname(audioFilePath) || '.mp3'}`);
  const durationArg = (span.end - span.start).toString();

  try {
    try {
      await execFileAsync(ffmpegInstaller.path, [
        '-y',
        '-ss', span.start.toString(),
        '-i', audioFilePath,
        '-t', durationArg,
        '-c', 'copy',
        '-avoid_negative_ts', 'make_zero',
        outputPath
      ], { timeout: 60000 });
    } catch (copyError) {
      log.warn('[Audio] Stream copy failed, re-encoding range', {
        start: span.start,
        end: span.end,
        error: describeError(copyError)
      });
      await execFileAsync(ffmpegInstaller.path, [
        '-y',
        '-ss', span.start.toString(),
        '-i', audioFilePath,
        '-t', durationArg,
        '-acodec', 'libmp3lame',
        '-ab', '128k',
        outputPath
      ], { timeout: 300000 });
    }

    const buffer = await fs.promises.readFile(outputPath);
    if (buffer.length === 0) {
      throw new Error(`Extracted range [${span.start}, ${span.end}] is empty`);
    }
    return buffer;
  } finally {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  }
}

function readStderr(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    return typeof stderr === 'string' ? stderr : null;
  }
  return null;
}

export const ffmpegAudioToolkit: AudioToolkit = {
  getDuration: getAudioDuration,
  detectPauses: detectSilenceGaps,
  extractRange: extractAudioRange
};
