/**
 * Audio Intelligence Pipeline
 *
 * One call turns a stored recording into a speaker-attributed transcript and
 * a deduplicated knowledge set:
 *
 *   download -> measure -> plan audio chunks -> transcribe + diarize
 *   -> refine speakers -> plan text chunks -> extract + merge -> write artifact
 *
 * Per-chunk failures are recorded in the result and never abort the run.
 * Unsplittable input and infrastructure failures (download, artifact write)
 * are fatal and propagate after the run is marked failed.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { log, describeError } from './logger';
import { PipelineError } from './errors';
import { resolvePipelineConfig } from './config';
import type { PipelineConfig, PipelineConfigOverrides } from './config';
import { ffmpegAudioToolkit } from './audio';
import type { AudioToolkit } from './audio';
import { needsAudioChunking, planAudioChunks, planTextChunks, validateChunkSequence } from './chunking';
import { TranscriptionOrchestrator } from './transcribe';
import type { ChunkAudioLoader } from './transcribe';
import { refineSpeakers } from './speakerRefinement';
import { ExtractionEngine } from './extractionEngine';
import { ProcessingStep, ProgressReporter } from './progressManager';
import type { ProgressCallback, ProgressSink } from './progressManager';
import type { ExtractionService } from './extraction';
import type { SpeechModelHandle } from './speechModel';
import type { ObjectStorage } from './storage';
import type { PipelineResult } from './types';

export interface PipelineDependencies {
  storage: ObjectStorage;
  speechModel: SpeechModelHandle;
  extractionService: ExtractionService;
  config?: PipelineConfigOverrides;
  audio?: AudioToolkit;
  /** Where to mirror progress for a run, e.g. its Firestore document */
  progressSink?: (runId: string) => ProgressSink;
}

export interface ProcessOptions {
  runId?: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export function artifactPath(runId: string): string {
  return `runs/${runId}/knowledge.json`;
}

export class AudioIntelligencePipeline {
  readonly config: PipelineConfig;
  private readonly audio: AudioToolkit;
  private readonly orchestrator: TranscriptionOrchestrator;
  private readonly extractionEngine: ExtractionEngine;

  /**
   * @throws ConfigurationError when the overrides are invalid
   */
  constructor(private readonly deps: PipelineDependencies) {
    this.config = resolvePipelineConfig(deps.config);
    this.audio = deps.audio ?? ffmpegAudioToolkit;
    this.orchestrator = new TranscriptionOrchestrator(deps.speechModel, this.config.transcription);
    this.extractionEngine = new ExtractionEngine(deps.extractionService, this.config.extraction);
  }

  async process(audioReference: string, options: ProcessOptions = {}): Promise<PipelineResult> {
    const runId = options.runId ?? randomUUID();
    const { signal } = options;
    const progress = new ProgressReporter(runId, options.onProgress, this.deps.progressSink?.(runId));
    const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), `run-${runId}-`));
    const startTime = Date.now();

    log.info('[Pipeline] Run started', { runId, audioReference });

    try {
      // Step 1: Download
      await progress.setStep(ProcessingStep.DOWNLOADING);
      const audioBuffer = await this.deps.storage.get(audioReference);
      const audioPath = path.join(tempDir, `source${path.extname(audioReference) || '.audio'}`);
      await fs.promises.writeFile(audioPath, audioBuffer);

      // Step 2: Measure and plan audio chunks
      await progress.setStep(ProcessingStep.CHUNKING);
      const chunking = this.config.chunking;
      const durationSeconds = await this.audio.getDuration(audioPath);
      const pauses = needsAudioChunking(durationSeconds, chunking)
        ? await this.audio.detectPauses(audioPath, {
            thresholdDb: chunking.silenceThresholdDb,
            minDurationSeconds: chunking.silenceMinDurationSeconds
          })
        : [];
      const audioChunks = planAudioChunks(durationSeconds, pauses, chunking);

      const validation = validateChunkSequence(audioChunks, durationSeconds);
      if (!validation.valid) {
        throw new PipelineError(`Audio chunk plan is invalid: ${validation.errors.join('; ')}`);
      }

      // Step 3: Transcribe + diarize, chunk by chunk
      await progress.setStep(ProcessingStep.TRANSCRIBING);
      const loadAudio: ChunkAudioLoader = audioChunks.length === 1
        ? () => Promise.resolve(audioBuffer)
        : chunk => this.audio.extractRange(audioPath, chunk.range);

      let transcribed = 0;
      const transcription = await this.orchestrator.transcribeRecording(audioChunks, loadAudio, {
        signal,
        onChunkSettled: () => progress.setDetail(++transcribed, audioChunks.length, 'audio chunk')
      });

      // Step 4: Refine speakers
      await progress.setStep(ProcessingStep.REFINING);
      const refinement = refineSpeakers(transcription.segments, this.config.refinement);

      // Step 5: Extract knowledge
      await progress.setStep(ProcessingStep.EXTRACTING);
      const textChunks = planTextChunks(refinement.segments, chunking);
      let extracted = 0;
      const extraction = await this.extractionEngine.run(textChunks, {
        signal,
        onChunkSettled: () => progress.setDetail(++extracted, textChunks.length, 'text chunk')
      });

      // Step 6: Write the artifact
      await progress.setStep(ProcessingStep.FINALIZING);
      const result: PipelineResult = {
        runId,
        audioReference,
        durationSeconds,
        language: transcription.language,
        segments: refinement.segments,
        knowledgeSet: extraction.knowledgeSet,
        documentInsights: extraction.documentInsights,
        perChunkErrors: [...transcription.errors, ...extraction.errors],
        qualityFlags: [...transcription.qualityFlags, ...refinement.qualityFlags, ...extraction.qualityFlags],
        retryEvents: transcription.retryEvents,
        speakerReport: refinement.report,
        audioChunkCount: audioChunks.length,
        textChunkCount: textChunks.length,
        cancelled: transcription.cancelled || extraction.cancelled || (signal?.aborted ?? false)
      };

      await this.deps.storage.put(artifactPath(runId), JSON.stringify(result, null, 2), 'application/json');

      if (result.cancelled) {
        await progress.setFailed('Run cancelled; partial results saved');
      } else {
        await progress.setComplete();
      }

      log.info('[Pipeline] Run complete', {
        runId,
        durationSeconds,
        audioChunks: audioChunks.length,
        textChunks: textChunks.length,
        segments: result.segments.length,
        entities: result.knowledgeSet.entities.length,
        relationships: result.knowledgeSet.relationships.length,
        chunkErrors: result.perChunkErrors.length,
        qualityFlags: result.qualityFlags.map(f => f.code),
        cancelled: result.cancelled,
        totalMs: Date.now() - startTime
      });

      return result;
    } catch (error) {
      log.error('[Pipeline] Run failed', { runId, audioReference, error: describeError(error) });
      await progress.setFailed(describeError(error));
      throw error;
    } finally {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  }
}
