/**
 * Tests for the transcription/diarization orchestrator
 *
 * Validates:
 * - Resource exhaustion retries with strictly smaller batches
 * - Permanent chunk failures never block the other chunks
 * - Majority language detection
 * - The speech model is loaded once per handle
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
  TranscriptionOrchestrator,
  assignUtteranceSpeaker,
  batchSizeSchedule,
  majorityLanguage,
  sampleChunks,
  toRecordingSegments
} from '../transcribe';
import type { ChunkAudioLoader } from '../transcribe';
import { SpeechModelHandle } from '../speechModel';
import type { SpeechModel, SpeechTranscription, TranscribeOptions } from '../speechModel';
import { PIPELINE_CONFIG } from '../config';
import type { TranscriptionConfig } from '../config';
import { ChunkFailureError, ResourceExhaustedError } from '../errors';
import { createTimeSpan } from '../types';
import type { AudioChunk } from '../types';

const config: TranscriptionConfig = { ...PIPELINE_CONFIG.transcription, languageHint: 'en' };

function audioChunk(index: number, start: number, end: number): AudioChunk {
  return { index, range: createTimeSpan(start, end), payload: { cutAtPause: false } };
}

function speech(text: string, start = 1, end = 3, speaker = 'SPEAKER_00'): SpeechTranscription {
  return { utterances: [{ start, end, text, speaker }], language: 'en' };
}

function fakeModel(
  transcribe: (audio: Buffer, options: TranscribeOptions) => Promise<SpeechTranscription>,
  detectLanguage: (audio: Buffer) => Promise<string | null> = async () => 'en'
) {
  const model = {
    name: 'fake',
    transcribe: vi.fn(transcribe),
    detectLanguage: vi.fn(detectLanguage)
  } satisfies SpeechModel;
  return model;
}

const loadByIndex: ChunkAudioLoader = async chunk => Buffer.from(`chunk-${chunk.index}`);

describe('transcribe', () => {
  describe('batchSizeSchedule', () => {
    it('should halve the batch size each attempt', () => {
      expect(batchSizeSchedule(config)).toEqual([16, 8, 4]);
    });

    it('should stop when the size can no longer shrink', () => {
      expect(batchSizeSchedule({ ...config, initialBatchSize: 2, minBatchSize: 1, maxTranscriptionAttempts: 5 })).toEqual([2, 1]);
      expect(batchSizeSchedule({ ...config, initialBatchSize: 16, minBatchSize: 16 })).toEqual([16]);
    });
  });

  describe('transcribeChunk', () => {
    it('should succeed at half batch size after GPU exhaustion and log a retry event', async () => {
      const model = fakeModel(async () => speech('unused'));
      model.transcribe
        .mockRejectedValueOnce(new ResourceExhaustedError('CUDA out of memory'))
        .mockResolvedValueOnce({
          utterances: [{
            start: 10,
            end: 12.5,
            text: ' hello there ',
            words: [
              { word: 'hello', start: 10, end: 11, score: 0.8, speaker: 'SPEAKER_01' },
              { word: 'there', start: 11, end: 12.5, score: 0.6, speaker: 'SPEAKER_01' }
            ]
          }],
          language: 'en'
        });
      const orchestrator = new TranscriptionOrchestrator(new SpeechModelHandle(async () => model), config);

      const result = await orchestrator.transcribeChunk(audioChunk(1, 1800, 3600), Buffer.from('a'), 'en');

      expect(result.attempts).toBe(2);
      expect(result.batchSize).toBe(8);
      expect(result.retryEvents).toEqual([{
        chunkIndex: 1,
        attempt: 1,
        previousBatchSize: 16,
        nextBatchSize: 8,
        reason: 'resource_exhausted',
        message: 'CUDA out of memory'
      }]);
      expect(result.segments).toHaveLength(1);
      expect(result.segments[0].span).toEqual({ start: 1810, end: 1812.5 });
      expect(result.segments[0].text).toBe('hello there');
      expect(result.segments[0].speakerId).toBe('SPEAKER_01');
      expect(result.segments[0].sourceChunk).toBe(1);
      expect(result.segments[0].wordConfidence).toBeCloseTo(0.7);
      expect(model.transcribe.mock.calls.map(([, options]) => options.batchSize)).toEqual([16, 8]);
      expect(model.transcribe.mock.calls[1][1].languageHint).toBe('en');
    });

    it('should fail permanently after the attempt cap', async () => {
      const model = fakeModel(() => Promise.reject(new ResourceExhaustedError('CUDA out of memory')));
      const orchestrator = new TranscriptionOrchestrator(new SpeechModelHandle(async () => model), config);

      const attempt = orchestrator.transcribeChunk(audioChunk(0, 0, 60), Buffer.from('a'), null);

      await expect(attempt).rejects.toBeInstanceOf(ChunkFailureError);
      await expect(attempt).rejects.toMatchObject({ kind: 'resource_exhausted', attempts: 3, chunkIndex: 0 });
      expect(model.transcribe.mock.calls.map(([, options]) => options.batchSize)).toEqual([16, 8, 4]);
    });

    it('should treat a timed-out call as exhaustion', async () => {
      const model = fakeModel((_audio, options) => new Promise((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      }));
      const orchestrator = new TranscriptionOrchestrator(
        new SpeechModelHandle(async () => model),
        { ...config, transcriptionTimeoutMs: 20 }
      );

      await expect(orchestrator.transcribeChunk(audioChunk(0, 0, 60), Buffer.from('a'), null))
        .rejects.toMatchObject({ kind: 'timeout', attempts: 3 });
      expect(model.transcribe).toHaveBeenCalledTimes(3);
    });

    it('should NOT retry other model errors', async () => {
      const model = fakeModel(() => Promise.reject(new Error('unsupported audio format')));
      const orchestrator = new TranscriptionOrchestrator(new SpeechModelHandle(async () => model), config);

      await expect(orchestrator.transcribeChunk(audioChunk(0, 0, 60), Buffer.from('a'), null))
        .rejects.toMatchObject({ kind: 'model_error', attempts: 1 });
      expect(model.transcribe).toHaveBeenCalledTimes(1);
    });
  });

  describe('transcribeRecording', () => {
    const chunks = [audioChunk(0, 0, 1800), audioChunk(1, 1800, 3600), audioChunk(2, 3600, 4000)];

    it('should record a failed chunk and keep the others', async () => {
      const model = fakeModel(async audio => {
        if (audio.toString() === 'chunk-1') {
          throw new Error('boom');
        }
        return speech(audio.toString());
      });
      const orchestrator = new TranscriptionOrchestrator(new SpeechModelHandle(async () => model), config);

      const result = await orchestrator.transcribeRecording(chunks, loadByIndex);

      expect(result.completedChunks).toEqual([0, 2]);
      expect(result.errors).toEqual([{
        stage: 'transcription',
        chunkIndex: 1,
        kind: 'model_error',
        message: 'Speech model failed on chunk 1: boom',
        attempts: 1
      }]);
      expect(result.segments.map(s => [s.text, s.span.start])).toEqual([
        ['chunk-0', 1],
        ['chunk-2', 3601]
      ]);
      expect(result.cancelled).toBe(false);
    });

    it('should record a chunk whose audio cannot be loaded', async () => {
      const model = fakeModel(async () => speech('ok'));
      const orchestrator = new TranscriptionOrchestrator(new SpeechModelHandle(async () => model), config);
      const loadAudio: ChunkAudioLoader = async chunk => {
        if (chunk.index === 2) throw new Error('ffmpeg failed');
        return Buffer.from('x');
      };

      const result = await orchestrator.transcribeRecording(chunks, loadAudio);

      expect(result.errors.map(e => [e.chunkIndex, e.kind])).toEqual([[2, 'audio_unavailable']]);
      expect(result.completedChunks).toEqual([0, 1]);
    });

    it('should load the speech model once for the whole recording', async () => {
      const model = fakeModel(async () => speech('ok'));
      const loader = vi.fn(async () => model);
      const handle = new SpeechModelHandle(loader);
      const orchestrator = new TranscriptionOrchestrator(handle, config);

      await orchestrator.transcribeRecording(chunks, loadByIndex);
      await orchestrator.transcribeRecording(chunks, loadByIndex);

      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('should apply the majority sampled language to every chunk', async () => {
      const languages: Record<string, string> = { 'chunk-0': 'en', 'chunk-2': 'fr', 'chunk-4': 'en' };
      const model = fakeModel(async () => speech('ok'), async audio => languages[audio.toString()] ?? null);
      const orchestrator = new TranscriptionOrchestrator(
        new SpeechModelHandle(async () => model),
        { ...config, languageHint: null }
      );
      const five = [0, 1, 2, 3, 4].map(i => audioChunk(i, i * 100, i * 100 + 100));

      const result = await orchestrator.transcribeRecording(five, loadByIndex);

      expect(result.language).toBe('en');
      expect(model.detectLanguage.mock.calls.map(([audio]) => audio.toString())).toEqual(['chunk-0', 'chunk-2', 'chunk-4']);
      expect(model.transcribe.mock.calls.every(([, options]) => options.languageHint === 'en')).toBe(true);
      expect(result.qualityFlags).toEqual([]);
    });

    it('should flag a recording whose language could not be detected', async () => {
      const model = fakeModel(async () => speech('ok'), () => Promise.reject(new Error('detector down')));
      const orchestrator = new TranscriptionOrchestrator(
        new SpeechModelHandle(async () => model),
        { ...config, languageHint: null }
      );

      const result = await orchestrator.transcribeRecording(chunks, loadByIndex);

      expect(result.language).toBeNull();
      expect(result.qualityFlags.map(f => f.code)).toEqual(['language_detection_failed']);
      expect(result.completedChunks).toEqual([0, 1, 2]);
    });

    it('should stop unstarted chunks on cancellation and keep finished ones', async () => {
      const model = fakeModel(async audio => speech(audio.toString()));
      const orchestrator = new TranscriptionOrchestrator(new SpeechModelHandle(async () => model), config);
      const controller = new AbortController();

      const result = await orchestrator.transcribeRecording(chunks, loadByIndex, {
        signal: controller.signal,
        onChunkSettled: () => controller.abort()
      });

      expect(result.cancelled).toBe(true);
      expect(result.segments.map(s => s.text)).toEqual(['chunk-0']);
      expect(result.errors.map(e => [e.chunkIndex, e.kind])).toEqual([[1, 'cancelled'], [2, 'cancelled']]);
      expect(model.transcribe).toHaveBeenCalledTimes(1);
    });
  });

  describe('helpers', () => {
    it('should assign the speaker covering the most word time', () => {
      expect(assignUtteranceSpeaker({
        start: 0,
        end: 3,
        text: 'a b',
        speaker: 'A',
        words: [
          { word: 'a', start: 0, end: 1, speaker: 'A' },
          { word: 'b', start: 1, end: 3, speaker: 'B' }
        ]
      })).toBe('B');
      expect(assignUtteranceSpeaker({ start: 0, end: 1, text: 'a', speaker: 'A' })).toBe('A');
      expect(assignUtteranceSpeaker({ start: 0, end: 1, text: 'a' })).toBeNull();
    });

    it('should shift, clamp and filter utterances onto the recording timeline', () => {
      const segments = toRecordingSegments(
        [
          { start: 40, end: 45, text: 'past the end' },
          { start: 29, end: 31, text: 'overhangs' },
          { start: 1, end: 2, text: '   ' },
          { start: 5, end: 6, text: 'early', confidence: 0.4 }
        ],
        audioChunk(3, 100, 130)
      );

      expect(segments.map(s => [s.text, s.span.start, s.span.end, s.wordConfidence])).toEqual([
        ['early', 105, 106, 0.4],
        ['overhangs', 129, 130, 0]
      ]);
    });

    it('should sample chunks evenly from first to last', () => {
      expect(sampleChunks([0, 1, 2, 3, 4], 3)).toEqual([0, 2, 4]);
      expect(sampleChunks([0, 1], 3)).toEqual([0, 1]);
      expect(sampleChunks([0, 1, 2, 3], 1)).toEqual([0]);
    });

    it('should break language ties toward the earliest sample', () => {
      expect(majorityLanguage([
        { chunkIndex: 0, language: 'fr' },
        { chunkIndex: 1, language: 'en' }
      ])).toBe('fr');
      expect(majorityLanguage([{ chunkIndex: 0, language: null }])).toBeNull();
    });
  });
});
