/**
 * Speech Model Boundary
 *
 * The speech-to-text + diarization model is an external collaborator. This
 * module defines what the orchestrator needs from it, an explicit
 * ownership-scoped handle for the loaded model, and the WhisperX-on-Replicate
 * implementation used in production.
 *
 * The handle is created once per worker and injected; it loads lazily on
 * first use and is shared read-only by every run the worker executes.
 */

import Replicate from 'replicate';
import { log, describeError } from './logger';
import { ResourceExhaustedError } from './errors';

// =============================================================================
// Model Contract
// =============================================================================

export interface RawWord {
  word: string;
  start?: number;
  end?: number;
  score?: number;
  speaker?: string;
}

/**
 * One utterance as the model returns it. Times are relative to the start of
 * the audio that was sent.
 */
export interface RawUtterance {
  start: number;
  end: number;
  text: string;
  speaker?: string;
  confidence?: number;
  words?: RawWord[];
}

export interface SpeechTranscription {
  utterances: RawUtterance[];
  language: string | null;
}

export interface TranscribeOptions {
  languageHint: string | null;
  batchSize: number;
  signal?: AbortSignal;
}

export interface SpeechModel {
  readonly name: string;
  /**
   * @throws ResourceExhaustedError when the model ran out of GPU memory
   */
  transcribe(audio: Buffer, options: TranscribeOptions): Promise<SpeechTranscription>;
  detectLanguage(audio: Buffer, signal?: AbortSignal): Promise<string | null>;
}

export type SpeechModelLoader = () => Promise<SpeechModel>;

/**
 * Lazily-loaded, worker-scoped model resource.
 */
export class SpeechModelHandle {
  private loading: Promise<SpeechModel> | null = null;
  private loadCount = 0;

  constructor(private readonly loader: SpeechModelLoader) {}

  /**
   * Load on first call, then hand back the same instance. A failed load is
   * not memoised, so the next call tries again.
   */
  acquire(): Promise<SpeechModel> {
    if (!this.loading) {
      this.loadCount++;
      log.info('[SpeechModel] Loading speech model', { loadCount: this.loadCount });
      this.loading = this.loader().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }
}

// =============================================================================
// Resource Exhaustion
// =============================================================================

const RESOURCE_EXHAUSTION_PATTERNS = [
  /CUDA out of memory/i,
  /OutOfMemoryError/i,
  /out of memory/i,
  /RESOURCE_EXHAUSTED/,
  /CUBLAS_STATUS_ALLOC_FAILED/
];

export function isResourceExhaustionMessage(message: string): boolean {
  return RESOURCE_EXHAUSTION_PATTERNS.some(pattern => pattern.test(message));
}

// =============================================================================
// WhisperX on Replicate
// =============================================================================

export interface ReplicateSpeechModelOptions {
  apiToken: string;
  /** `owner/name` or `owner/name:version` */
  model: string;
  /** Hugging Face token for the gated pyannote diarization pipeline */
  huggingfaceToken?: string;
  audioMimeType?: string;
}

type ModelIdentifier = `${string}/${string}` | `${string}/${string}:${string}`;

function isModelIdentifier(model: string): model is ModelIdentifier {
  return /^[^/\s:]+\/[^/\s:]+(:[^/\s:]+)?$/.test(model);
}

export class ReplicateSpeechModel implements SpeechModel {
  readonly name: string;
  private readonly client: Replicate;
  private readonly model: ModelIdentifier;

  constructor(private readonly options: ReplicateSpeechModelOptions) {
    if (!options.apiToken) {
      throw new Error('REPLICATE_API_TOKEN not provided');
    }
    if (!isModelIdentifier(options.model)) {
      throw new Error(`Invalid Replicate model identifier: ${options.model}`);
    }
    this.model = options.model;
    this.name = `replicate:${options.model}`;
    this.client = new Replicate({ auth: options.apiToken });
  }

  async transcribe(audio: Buffer, options: TranscribeOptions): Promise<SpeechTranscription> {
    const input: Record<string, unknown> = {
      audio_file: this.toDataUri(audio),
      batch_size: options.batchSize,
      align_output: true,
      diarization: true
    };
    if (options.languageHint) {
      input.language = options.languageHint;
    }
    if (this.options.huggingfaceToken) {
      input.huggingface_access_token = this.options.huggingfaceToken;
    }

    log.info('[SpeechModel] Calling Replicate', {
      model: this.model,
      audioSizeMb: (audio.length / (1024 * 1024)).toFixed(2),
      batchSize: options.batchSize,
      language: options.languageHint
    });

    const startTime = Date.now();
    const output = await this.run(input, options.signal);
    const transcription = parseWhisperXOutput(output);

    log.info('[SpeechModel] Transcription complete', {
      utterances: transcription.utterances.length,
      language: transcription.language,
      durationSeconds: ((Date.now() - startTime) / 1000).toFixed(1)
    });

    return transcription;
  }

  async detectLanguage(audio: Buffer, signal?: AbortSignal): Promise<string | null> {
    const output = await this.run({
      audio_file: this.toDataUri(audio),
      align_output: false,
      diarization: false
    }, signal);
    return parseWhisperXOutput(output).language;
  }

  private async run(input: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    try {
      return await this.client.run(this.model, { input, signal });
    } catch (error) {
      const message = describeError(error);
      if (isResourceExhaustionMessage(message)) {
        throw new ResourceExhaustedError(`Speech model exhausted GPU resources: ${message}`, { cause: error });
      }
      throw error;
    }
  }

  private toDataUri(audio: Buffer): string {
    return `data:${this.options.audioMimeType ?? 'audio/mpeg'};base64,${audio.toString('base64')}`;
  }
}

/**
 * Parse WhisperX prediction output defensively.
 *
 * Expected shape: `{ segments: [{ start, end, text, speaker?, words?: [...] }],
 * detected_language?: string }`. Segments without text or timing are skipped.
 */
export function parseWhisperXOutput(output: unknown): SpeechTranscription {
  if (typeof output !== 'object' || output === null) {
    return { utterances: [], language: null };
  }

  const record = output as Record<string, unknown>;
  const language = typeof record.detected_language === 'string'
    ? record.detected_language
    : typeof record.language === 'string' ? record.language : null;

  const utterances: RawUtterance[] = [];
  const rawSegments = Array.isArray(record.segments) ? record.segments : [];

  for (const rawSegment of rawSegments) {
    if (typeof rawSegment !== 'object' || rawSegment === null) {
      continue;
    }
    const seg = rawSegment as Record<string, unknown>;
    const text = typeof seg.text === 'string' ? seg.text.trim() : '';
    if (!text || typeof seg.start !== 'number' || typeof seg.end !== 'number') {
      continue;
    }

    const utterance: RawUtterance = { start: seg.start, end: seg.end, text };
    if (typeof seg.speaker === 'string') {
      utterance.speaker = seg.speaker;
    }
    if (typeof seg.confidence === 'number') {
      utterance.confidence = seg.confidence;
    }
    if (Array.isArray(seg.words)) {
      utterance.words = seg.words.flatMap(parseWord);
    }
    utterances.push(utterance);
  }

  return { utterances, language };
}

function parseWord(rawWord: unknown): RawWord[] {
  if (typeof rawWord !== 'object' || rawWord === null) {
    return [];
  }
  const w = rawWord as Record<string, unknown>;
  if (typeof w.word !== 'string') {
    return [];
  }
  const word: RawWord = { word: w.word };
  if (typeof w.start === 'number') word.start = w.start;
  if (typeof w.end === 'number') word.end = w.end;
  if (typeof w.score === 'number') word.score = w.score;
  if (typeof w.speaker === 'string') word.speaker = w.speaker;
  return [word];
}
