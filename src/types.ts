/**
 * Shared types for the audio intelligence pipeline
 *
 * Segments and chunks are transient and scoped to one run. The knowledge set
 * snapshot inside PipelineResult is the only artifact handed to consumers.
 */

// =============================================================================
// Time
// =============================================================================

/**
 * Half-open interval on the recording timeline, in seconds.
 * Always `end > start`; instances are frozen.
 */
export interface TimeSpan {
  readonly start: number;
  readonly end: number;
}

export function createTimeSpan(start: number, end: number): TimeSpan {
  if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
    throw new RangeError(`Invalid time span: [${start}, ${end}]`);
  }
  return Object.freeze({ start, end });
}

export function spanDuration(span: TimeSpan): number {
  return span.end - span.start;
}

// =============================================================================
// Transcript
// =============================================================================

/**
 * One transcribed utterance.
 */
export interface Segment {
  span: TimeSpan;
  text: string;
  /** Diarization label, null when the model attributed nobody */
  speakerId: string | null;
  /** Mean word-level confidence (0-1) */
  wordConfidence: number;
  /** Index of the audio chunk that produced this segment */
  sourceChunk: number;
}

/**
 * Derived per-speaker view over the current segments. Never persisted.
 */
export interface SpeakerProfile {
  speakerId: string;
  segmentCount: number;
  /** Seconds of speech attributed to this speaker */
  totalDuration: number;
  /** totalDuration / total attributed speech (0-1) */
  shareOfTotal: number;
}

// =============================================================================
// Chunks
// =============================================================================

/**
 * A contiguous, non-overlapping slice of the input under a size budget.
 * Index order equals temporal order.
 */
export interface Chunk<R, P> {
  index: number;
  range: R;
  payload: P;
}

export type AudioChunk = Chunk<TimeSpan, { cutAtPause: boolean }>;

/** Inclusive segment index range */
export interface SegmentRange {
  first: number;
  last: number;
}

export interface TextChunk extends Chunk<SegmentRange, string> {
  /** Recording time covered by the chunk's segments */
  span: TimeSpan;
}

// =============================================================================
// Knowledge
// =============================================================================

export interface ExtractedEntity {
  name: string;
  type: string;
  confidence: number;
  evidence: string | null;
  sourceChunk: number;
}

export interface ExtractedRelationship {
  subject: string;
  predicate: string;
  object: string;
  confidence: number;
  evidence: string | null;
  sourceChunk: number;
}

export interface Topic {
  name: string;
  relevance: number;
}

export interface KeyMoment {
  description: string;
  /** Seconds into the recording */
  timestamp: number;
  significance: number;
}

export interface Sentiment {
  /** -1 (negative) to 1 (positive) */
  overall: number;
  byTopic: Record<string, number>;
}

/**
 * Whole-document fields. Only requested when the transcript fits a single
 * text chunk; no chunk has the context to produce them otherwise.
 */
export interface DocumentInsights {
  topics: Topic[];
  keyMoments: KeyMoment[];
  sentiment: Sentiment | null;
}

/**
 * Typed result of one extraction call, after boundary validation.
 */
export interface ChunkExtraction {
  chunkIndex: number;
  entities: ExtractedEntity[];
  relationships: ExtractedRelationship[];
  insights: DocumentInsights | null;
  /** Items dropped at the boundary because they did not match the schema */
  quarantined: number;
}

export interface KnowledgeSetSnapshot {
  entities: ExtractedEntity[];
  relationships: ExtractedRelationship[];
}

// =============================================================================
// Run reporting
// =============================================================================

export type ChunkErrorKind =
  | 'resource_exhausted'
  | 'timeout'
  | 'model_error'
  | 'audio_unavailable'
  | 'extraction_failed'
  | 'malformed_response'
  | 'cancelled';

/**
 * A chunk that contributed nothing to the result, and why.
 */
export interface ChunkError {
  stage: 'transcription' | 'extraction';
  chunkIndex: number;
  kind: ChunkErrorKind;
  message: string;
  attempts: number;
}

/**
 * A degraded retry of an audio chunk after resource exhaustion.
 */
export interface RetryEvent {
  chunkIndex: number;
  attempt: number;
  previousBatchSize: number;
  nextBatchSize: number;
  reason: 'resource_exhausted' | 'timeout';
  message: string;
}

export type QualityFlagCode =
  | 'speaker_refinement_not_converged'
  | 'language_detection_failed'
  | 'document_insights_skipped'
  | 'document_insights_unavailable';

export interface QualityFlag {
  code: QualityFlagCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface SpeakerRefinementReport {
  originalSpeakerCount: number;
  finalSpeakerCount: number;
  majorShareThreshold: number;
  majorSpeakers: string[];
  degenerateSegmentsMerged: number;
  interjectionsReattributed: number;
  residualSegmentsReassigned: number;
  /** Summed segment durations */
  speechSecondsBefore: number;
  speechSecondsAfter: number;
}

export interface PipelineResult {
  runId: string;
  audioReference: string;
  durationSeconds: number;
  language: string | null;
  segments: Segment[];
  knowledgeSet: KnowledgeSetSnapshot;
  documentInsights: DocumentInsights | null;
  perChunkErrors: ChunkError[];
  qualityFlags: QualityFlag[];
  retryEvents: RetryEvent[];
  speakerReport: SpeakerRefinementReport;
  audioChunkCount: number;
  textChunkCount: number;
  /** True when the run was cancelled; completed chunks are still included */
  cancelled: boolean;
}
