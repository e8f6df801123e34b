/**
 * Pipeline Configuration
 *
 * Every heuristic threshold the pipeline uses lives here, grouped by stage,
 * so each stage receives exactly the structure it needs and the values can
 * be tuned per dataset without touching the algorithms.
 *
 * Overrides are deep-merged over PIPELINE_CONFIG and validated once;
 * an invalid combination fails before any audio is touched.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

const fraction = z.number().min(0).max(1);

export const ChunkingConfigSchema = z.object({
  /** Speech model hard per-call limit; audio longer than this is split (30 min) */
  speechCeilingSeconds: z.number().positive(),
  /** How far before the ceiling a cut may snap back to a pause */
  pauseToleranceSeconds: z.number().nonnegative(),
  /** ffmpeg silencedetect noise floor in dB */
  silenceThresholdDb: z.number().max(0),
  /** Minimum silence length that counts as a pause */
  silenceMinDurationSeconds: z.number().positive(),
  /** Segments per text chunk sent to the LLM */
  segmentsPerTextChunk: z.number().int().positive(),
  /** LLM soft context limit, in rendered transcript characters */
  llmContextCeilingChars: z.number().int().positive()
});

export const TranscriptionConfigSchema = z.object({
  initialBatchSize: z.number().int().positive(),
  minBatchSize: z.number().int().positive(),
  /** Attempts per audio chunk, including the first */
  maxTranscriptionAttempts: z.number().int().positive(),
  transcriptionTimeoutMs: z.number().int().positive(),
  /** How many audio chunks are sampled for language detection */
  languageSampleChunks: z.number().int().positive(),
  /** Skip detection and use this language for every chunk */
  languageHint: z.string().min(2).nullable()
});

export const RefinementConfigSchema = z.object({
  minSegmentSeconds: z.number().nonnegative(),
  majorShareThreshold: fraction,
  /** Pick the major threshold from the initial speaker count instead */
  adaptiveMajorThreshold: z.boolean(),
  interjectionMaxSeconds: z.number().positive(),
  interjectionMaxWords: z.number().int().positive(),
  residualShareThreshold: fraction,
  /** Flag the run when more speakers than this survive refinement */
  maxExpectedSpeakers: z.number().int().positive().nullable()
});

export const ExtractionConfigSchema = z.object({
  entityConfidenceFloor: fraction,
  relationshipConfidenceFloor: fraction,
  extractionConcurrency: z.number().int().positive(),
  extractionTimeoutMs: z.number().int().positive(),
  /** Attempts per text chunk, including the first */
  maxExtractionAttempts: z.number().int().positive(),
  extractionRetryDelayMs: z.number().int().nonnegative()
});

export const PipelineConfigSchema = z
  .object({
    chunking: ChunkingConfigSchema,
    transcription: TranscriptionConfigSchema,
    refinement: RefinementConfigSchema,
    extraction: ExtractionConfigSchema
  })
  .superRefine((config, ctx) => {
    if (config.chunking.pauseToleranceSeconds >= config.chunking.speechCeilingSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'pauseToleranceSeconds'],
        message: 'must be smaller than speechCeilingSeconds'
      });
    }
    if (config.transcription.minBatchSize > config.transcription.initialBatchSize) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['transcription', 'minBatchSize'],
        message: 'must not exceed initialBatchSize'
      });
    }
    if (config.refinement.residualShareThreshold > config.refinement.majorShareThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['refinement', 'residualShareThreshold'],
        message: 'must not exceed majorShareThreshold'
      });
    }
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type TranscriptionConfig = z.infer<typeof TranscriptionConfigSchema>;
export type RefinementConfig = z.infer<typeof RefinementConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export type PipelineConfigOverrides = {
  [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]>;
};

export const PIPELINE_CONFIG: PipelineConfig = {
  chunking: {
    speechCeilingSeconds: 1800,
    pauseToleranceSeconds: 60,
    silenceThresholdDb: -30,
    silenceMinDurationSeconds: 0.5,
    segmentsPerTextChunk: 150,
    llmContextCeilingChars: 50000
  },
  transcription: {
    initialBatchSize: 16,
    minBatchSize: 1,
    maxTranscriptionAttempts: 3,
    transcriptionTimeoutMs: 20 * 60 * 1000,
    languageSampleChunks: 3,
    languageHint: null
  },
  refinement: {
    minSegmentSeconds: 0.5,
    majorShareThreshold: 0.1,
    adaptiveMajorThreshold: false,
    interjectionMaxSeconds: 2.0,
    interjectionMaxWords: 5,
    residualShareThreshold: 0.01,
    maxExpectedSpeakers: null
  },
  extraction: {
    entityConfidenceFloor: 0.7,
    relationshipConfidenceFloor: 0.8,
    extractionConcurrency: 4,
    extractionTimeoutMs: 120 * 1000,
    maxExtractionAttempts: 2,
    extractionRetryDelayMs: 1000
  }
};

/**
 * Merge overrides over the defaults and validate the result.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolvePipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const merged = {
    chunking: { ...PIPELINE_CONFIG.chunking, ...overrides.chunking },
    transcription: { ...PIPELINE_CONFIG.transcription, ...overrides.transcription },
    refinement: { ...PIPELINE_CONFIG.refinement, ...overrides.refinement },
    extraction: { ...PIPELINE_CONFIG.extraction, ...overrides.extraction }
  };

  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
