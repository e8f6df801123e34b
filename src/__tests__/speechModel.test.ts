import { describe, it, expect, vi, beforeEach } from 'vitest';

const { run } = vi.hoisted(() => ({ run: vi.fn() }));

vi.mock('replicate', () => ({
  default: class {
    run(model: string, options: unknown) {
      return run(model, options);
    }
  }
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

import {
  ReplicateSpeechModel,
  SpeechModelHandle,
  isResourceExhaustionMessage,
  parseWhisperXOutput
} from '../speechModel';
import type { SpeechModel } from '../speechModel';
import { ResourceExhaustedError } from '../errors';

describe('speechModel', () => {
  describe('parseWhisperXOutput', () => {
    it('should read segments, words and the detected language', () => {
      const output = {
        detected_language: 'en',
        segments: [
          {
            start: 0.5,
            end: 2.1,
            text: ' Hello there ',
            speaker: 'SPEAKER_00',
            words: [
              { word: 'Hello', start: 0.5, end: 1.0, score: 0.92, speaker: 'SPEAKER_00' },
              { word: 'there', score: 0.8 },
              { start: 1.5 }
            ]
          }
        ]
      };

      expect(parseWhisperXOutput(output)).toEqual({
        language: 'en',
        utterances: [{
          start: 0.5,
          end: 2.1,
          text: 'Hello there',
          speaker: 'SPEAKER_00',
          words: [
            { word: 'Hello', start: 0.5, end: 1.0, score: 0.92, speaker: 'SPEAKER_00' },
            { word: 'there', score: 0.8 }
          ]
        }]
      });
    });

    it('should skip segments without text or timing', () => {
      const output = {
        segments: [
          { start: 0, end: 1, text: '   ' },
          { start: 1, text: 'no end' },
          'garbage',
          { start: 2, end: 3, text: 'kept' }
        ]
      };

      expect(parseWhisperXOutput(output)).toEqual({
        language: null,
        utterances: [{ start: 2, end: 3, text: 'kept' }]
      });
    });

    it('should return nothing for output that is not an object', () => {
      expect(parseWhisperXOutput(null)).toEqual({ utterances: [], language: null });
      expect(parseWhisperXOutput('oops')).toEqual({ utterances: [], language: null });
    });
  });

  describe('isResourceExhaustionMessage', () => {
    it('should recognize GPU memory failures', () => {
      expect(isResourceExhaustionMessage('torch.OutOfMemoryError: CUDA out of memory. Tried to allocate 2.00 GiB')).toBe(true);
      expect(isResourceExhaustionMessage('CUBLAS_STATUS_ALLOC_FAILED when calling cublasCreate')).toBe(true);
    });

    it('should ignore other failures', () => {
      expect(isResourceExhaustionMessage('Prediction interrupted')).toBe(false);
      expect(isResourceExhaustionMessage('Invalid audio file')).toBe(false);
    });
  });

  describe('SpeechModelHandle', () => {
    const model: SpeechModel = {
      name: 'fake',
      transcribe: async () => ({ utterances: [], language: null }),
      detectLanguage: async () => null
    };

    it('should load the model once and share it', async () => {
      const loader = vi.fn(async () => model);
      const handle = new SpeechModelHandle(loader);

      const [first, second] = await Promise.all([handle.acquire(), handle.acquire()]);

      expect(first).toBe(model);
      expect(second).toBe(model);
      expect(loader).toHaveBeenCalledTimes(1);
    });

    it('should try again after a failed load', async () => {
      const loader = vi.fn(async () => model);
      loader.mockRejectedValueOnce(new Error('cold start failed'));
      const handle = new SpeechModelHandle(loader);

      await expect(handle.acquire()).rejects.toThrow('cold start failed');
      await expect(handle.acquire()).resolves.toBe(model);
      expect(loader).toHaveBeenCalledTimes(2);
    });
  });

  describe('ReplicateSpeechModel', () => {
    beforeEach(() => {
      run.mockReset();
    });

    it('should send the batch size, language and diarization token', async () => {
      run.mockResolvedValueOnce({ detected_language: 'de', segments: [{ start: 0, end: 1, text: 'Hallo' }] });
      const speech = new ReplicateSpeechModel({
        apiToken: 'test-secret',
        model: 'acme/whisperx:abc123',
        huggingfaceToken: 'test-hf-token'
      });

      const result = await speech.transcribe(Buffer.from('audio'), { languageHint: 'de', batchSize: 8 });

      expect(result).toEqual({ language: 'de', utterances: [{ start: 0, end: 1, text: 'Hallo' }] });
      const [model, options] = run.mock.calls[0];
      expect(model).toBe('acme/whisperx:abc123');
      expect(options).toEqual({
        input: {
          audio_file: `data:audio/mpeg;base64,${Buffer.from('audio').toString('base64')}`,
          batch_size: 8,
          align_output: true,
          diarization: true,
          language: 'de',
          huggingface_access_token: 'test-hf-token'
        },
        signal: undefined
      });
    });

    it('should turn GPU memory errors into ResourceExhaustedError', async () => {
      run.mockRejectedValueOnce(new Error('CUDA out of memory'));
      const speech = new ReplicateSpeechModel({ apiToken: 'test-secret', model: 'acme/whisperx' });

      await expect(speech.transcribe(Buffer.from('audio'), { languageHint: null, batchSize: 16 }))
        .rejects.toBeInstanceOf(ResourceExhaustedError);
    });

    it('should pass other errors through unchanged', async () => {
      const failure = new Error('Invalid audio file');
      run.mockRejectedValueOnce(failure);
      const speech = new ReplicateSpeechModel({ apiToken: 'test-secret', model: 'acme/whisperx' });

      await expect(speech.transcribe(Buffer.from('audio'), { languageHint: null, batchSize: 16 })).rejects.toBe(failure);
    });

    it('should detect language without diarization', async () => {
      run.mockResolvedValueOnce({ detected_language: 'fr', segments: [] });
      const speech = new ReplicateSpeechModel({ apiToken: 'test-secret', model: 'acme/whisperx' });

      await expect(speech.detectLanguage(Buffer.from('audio'))).resolves.toBe('fr');
      expect(run.mock.calls[0][1]).toMatchObject({ input: { align_output: false, diarization: false } });
    });

    it('should validate its options', () => {
      expect(() => new ReplicateSpeechModel({ apiToken: '', model: 'acme/whisperx' }))
        .toThrow('REPLICATE_API_TOKEN not provided');
      expect(() => new ReplicateSpeechModel({ apiToken: 'test-secret', model: 'whisperx' }))
        .toThrow('Invalid Replicate model identifier: whisperx');
    });
  });
});
