/**
 * Cloud Functions for the audio intelligence pipeline
 *
 * processRecording runs the whole pipeline for one stored recording:
 * transcription and diarization on Replicate (WhisperX), speaker refinement,
 * and knowledge extraction with Gemini. Progress is mirrored to
 * runs/{runId} in Firestore; the result lands at runs/{runId}/knowledge.json
 * in the default bucket.
 */

import { initializeApp } from 'firebase-admin/app';
import { getFirestore } from 'firebase-admin/firestore';
import { getStorage } from 'firebase-admin/storage';
import { onRequest } from 'firebase-functions/v2/https';
import { defineSecret, defineString } from 'firebase-functions/params';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { log, describeError } from './logger';
import { UnsplittableInputError } from './errors';
import { AudioIntelligencePipeline, artifactPath } from './pipeline';
import { GeminiExtractionService } from './extraction';
import { ReplicateSpeechModel, SpeechModelHandle } from './speechModel';
import { FirebaseObjectStorage } from './storage';
import { createFirestoreProgressSink } from './progressManager';

// Initialize Firebase Admin (uses default service account)
initializeApp();

export const db = getFirestore();
export const bucket = getStorage().bucket();

const replicateApiToken = defineSecret('REPLICATE_API_TOKEN');
const huggingfaceAccessToken = defineSecret('HUGGINGFACE_ACCESS_TOKEN');
const geminiApiKey = defineSecret('GEMINI_API_KEY');
const whisperxModel = defineString('WHISPERX_MODEL', { default: 'victor-upmeet/whisperx' });
const geminiModel = defineString('GEMINI_MODEL', { default: 'gemini-2.5-flash' });

const ProcessRecordingRequestSchema = z.object({
  storagePath: z.string().trim().min(1),
  runId: z.string().regex(/^[A-Za-z0-9_-]{1,128}$/).optional()
});

// One pipeline (and one loaded speech model) per worker instance, shared by
// every request the instance serves
let pipeline: AudioIntelligencePipeline | null = null;

function getPipeline(): AudioIntelligencePipeline {
  if (!pipeline) {
    const speechModel = new SpeechModelHandle(async () => new ReplicateSpeechModel({
      apiToken: replicateApiToken.value(),
      model: whisperxModel.value(),
      huggingfaceToken: huggingfaceAccessToken.value() || undefined
    }));

    pipeline = new AudioIntelligencePipeline({
      storage: new FirebaseObjectStorage(bucket),
      speechModel,
      extractionService: new GeminiExtractionService({
        apiKey: geminiApiKey.value(),
        model: geminiModel.value()
      }),
      progressSink: runId => createFirestoreProgressSink(db, runId)
    });
  }
  return pipeline;
}

/**
 * HTTP function: POST { storagePath, runId? }.
 *
 * Returns 200 with the run summary (chunk errors and quality flags
 * included), 400 for a bad request or unsplittable input, 500 otherwise.
 */
export const processRecording = onRequest(
  {
    memory: '2GiB',
    timeoutSeconds: 3600, // 60 minutes (long recordings are transcribed chunk by chunk)
    region: 'us-central1',
    invoker: 'private',
    secrets: [replicateApiToken, huggingfaceAccessToken, geminiApiKey]
  },
  async (req, res) => {
    const parsed = ProcessRecordingRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      log.warn('[ProcessRecording] Invalid payload', { message });
      res.status(400).send(`Bad Request: ${message}`);
      return;
    }

    const { storagePath } = parsed.data;
    const runId = parsed.data.runId ?? randomUUID();

    // Stop unstarted chunks if the caller goes away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const result = await getPipeline().process(storagePath, { runId, signal: controller.signal });
      res.status(200).json({
        runId: result.runId,
        artifact: artifactPath(result.runId),
        language: result.language,
        segments: result.segments.length,
        entities: result.knowledgeSet.entities.length,
        relationships: result.knowledgeSet.relationships.length,
        perChunkErrors: result.perChunkErrors,
        qualityFlags: result.qualityFlags,
        retryEvents: result.retryEvents.length,
        cancelled: result.cancelled
      });
    } catch (error) {
      const message = describeError(error);
      log.error('[ProcessRecording] Run failed', { runId, storagePath, error: message });
      const status = error instanceof UnsplittableInputError ? 400 : 500;
      res.status(status).send(`Processing failed: ${message}`);
    }
  }
);
