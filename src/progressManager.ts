import { FieldValue } from 'firebase-admin/firestore';
import type { Firestore } from 'firebase-admin/firestore';
import { log, describeError } from './logger';

// Processing step enum (keep in sync with the run document readers)
export enum ProcessingStep {
  PENDING = 'pending',
  DOWNLOADING = 'downloading',
  CHUNKING = 'chunking',
  TRANSCRIBING = 'transcribing',
  REFINING = 'refining',
  EXTRACTING = 'extracting',
  FINALIZING = 'finalizing',
  COMPLETE = 'complete',
  FAILED = 'failed'
}

// Progress percentages per step
export const STEP_PERCENTAGES: Record<ProcessingStep, number> = {
  [ProcessingStep.PENDING]: 0,
  [ProcessingStep.DOWNLOADING]: 5,
  [ProcessingStep.CHUNKING]: 10,
  [ProcessingStep.TRANSCRIBING]: 15,
  [ProcessingStep.REFINING]: 65,
  [ProcessingStep.EXTRACTING]: 70,
  [ProcessingStep.FINALIZING]: 95,
  [ProcessingStep.COMPLETE]: 100,
  [ProcessingStep.FAILED]: 0
};

export interface StepMeta {
  label: string;
  description?: string;
  category: 'pending' | 'active' | 'success' | 'error';
}

// Self-describing metadata for each processing step
const STEP_META: Record<ProcessingStep, StepMeta> = {
  [ProcessingStep.PENDING]: {
    label: 'Pending',
    description: 'Waiting to start processing',
    category: 'pending'
  },
  [ProcessingStep.DOWNLOADING]: {
    label: 'Downloading',
    description: 'Fetching the recording from storage',
    category: 'active'
  },
  [ProcessingStep.CHUNKING]: {
    label: 'Chunking',
    description: 'Measuring the recording and planning audio chunks',
    category: 'active'
  },
  [ProcessingStep.TRANSCRIBING]: {
    label: 'Transcribing',
    description: 'Converting speech to text with speaker diarization',
    category: 'active'
  },
  [ProcessingStep.REFINING]: {
    label: 'Refining Speakers',
    description: 'Merging over-segmented speaker labels',
    category: 'active'
  },
  [ProcessingStep.EXTRACTING]: {
    label: 'Extracting',
    description: 'Extracting entities and relationships from the transcript',
    category: 'active'
  },
  [ProcessingStep.FINALIZING]: {
    label: 'Finalizing',
    description: 'Saving results and cleaning up',
    category: 'active'
  },
  [ProcessingStep.COMPLETE]: {
    label: 'Complete',
    description: 'Processing finished successfully',
    category: 'success'
  },
  [ProcessingStep.FAILED]: {
    label: 'Failed',
    description: 'Processing encountered an error',
    category: 'error'
  }
};

export interface ProcessingTimeline {
  stepName: ProcessingStep;
  startedAt: string; // ISO timestamp (can't use FieldValue.serverTimestamp() in arrays)
  completedAt?: string;
  durationMs?: number;
}

export interface ProgressUpdate {
  runId: string;
  currentStep: ProcessingStep;
  percentComplete: number;
  stepMeta: StepMeta;
  /** e.g. "chunk 3/9" within the current step */
  detail?: string;
  errorMessage?: string;
  timeline: ProcessingTimeline[];
}

export type ProgressCallback = (update: ProgressUpdate) => void;

/**
 * Somewhere progress is mirrored to, e.g. the run's Firestore document.
 */
export interface ProgressSink {
  write(update: ProgressUpdate): Promise<void>;
}

/**
 * ProgressReporter - tracks the current step and its timeline for one run
 *
 * Every update goes to the caller's callback and to the optional sink.
 * Sink writes are serialized, so a slow write never lands after a later one.
 * Neither can fail the run: errors from either are logged and dropped.
 */
export class ProgressReporter {
  private timeline: ProcessingTimeline[] = [];
  private currentStep: ProcessingStep = ProcessingStep.PENDING;
  private currentStepStartTime: number = Date.now();
  private lastWrite: Promise<void> = Promise.resolve();

  constructor(
    private readonly runId: string,
    private readonly onProgress?: ProgressCallback,
    private readonly sink?: ProgressSink
  ) {}

  get step(): ProcessingStep {
    return this.currentStep;
  }

  getTimeline(): ProcessingTimeline[] {
    return this.timeline.map(entry => ({ ...entry }));
  }

  /**
   * Transition to a new processing step.
   */
  async setStep(step: ProcessingStep, errorMessage?: string): Promise<void> {
    const now = Date.now();
    const nowIso = new Date(now).toISOString();

    // Complete previous step in timeline if exists
    if (this.timeline.length > 0) {
      const prevStep = this.timeline[this.timeline.length - 1];
      prevStep.completedAt = nowIso;
      prevStep.durationMs = now - this.currentStepStartTime;
    }

    this.timeline.push({ stepName: step, startedAt: nowIso });
    this.currentStep = step;
    this.currentStepStartTime = now;

    log.info(`[ProgressManager] Step: ${step} (${STEP_PERCENTAGES[step]}%)`, {
      runId: this.runId,
      step,
      percentComplete: STEP_PERCENTAGES[step]
    });

    await this.publish(this.buildUpdate(step, errorMessage));
  }

  /**
   * Report progress within the current step without starting a new one.
   * `completed / total` moves the percentage toward the next step's.
   */
  async setDetail(completed: number, total: number, label: string): Promise<void> {
    const update = this.buildUpdate(this.currentStep);
    const next = nextStepPercentage(this.currentStep);
    if (total > 0 && next > update.percentComplete) {
      const fraction = Math.min(1, Math.max(0, completed / total));
      update.percentComplete = Math.round(update.percentComplete + (next - update.percentComplete) * fraction);
    }
    update.detail = `${label} ${completed}/${total}`;
    await this.publish(update);
  }

  async setFailed(errorMessage: string): Promise<void> {
    await this.setStep(ProcessingStep.FAILED, errorMessage);
  }

  async setComplete(): Promise<void> {
    await this.setStep(ProcessingStep.COMPLETE);
  }

  private buildUpdate(step: ProcessingStep, errorMessage?: string): ProgressUpdate {
    const baseMeta = STEP_META[step];
    const update: ProgressUpdate = {
      runId: this.runId,
      currentStep: step,
      percentComplete: STEP_PERCENTAGES[step],
      stepMeta: errorMessage ? { ...baseMeta, category: 'error' } : baseMeta,
      timeline: this.getTimeline()
    };
    if (errorMessage) {
      update.errorMessage = errorMessage;
    }
    return update;
  }

  private async publish(update: ProgressUpdate): Promise<void> {
    try {
      this.onProgress?.(update);
    } catch (error) {
      log.error('[ProgressManager] Progress callback failed (non-fatal)', {
        runId: this.runId,
        step: update.currentStep,
        error: describeError(error)
      });
    }

    // Sink writes land in the order updates were made
    this.lastWrite = this.lastWrite.then(() => this.writeToSink(update));
    await this.lastWrite;
  }

  private async writeToSink(update: ProgressUpdate): Promise<void> {
    if (!this.sink) {
      return;
    }
    try {
      await this.sink.write(update);
    } catch (error) {
      // Progress updates are nice-to-have, not critical
      log.error('[ProgressManager] Failed to update progress (non-fatal)', {
        runId: this.runId,
        step: update.currentStep,
        error: describeError(error)
      });
    }
  }
}

const STEP_ORDER: ProcessingStep[] = [
  ProcessingStep.PENDING,
  ProcessingStep.DOWNLOADING,
  ProcessingStep.CHUNKING,
  ProcessingStep.TRANSCRIBING,
  ProcessingStep.REFINING,
  ProcessingStep.EXTRACTING,
  ProcessingStep.FINALIZING,
  ProcessingStep.COMPLETE
];

function nextStepPercentage(step: ProcessingStep): number {
  const position = STEP_ORDER.indexOf(step);
  if (position < 0 || position === STEP_ORDER.length - 1) {
    return STEP_PERCENTAGES[step];
  }
  return STEP_PERCENTAGES[STEP_ORDER[position + 1]];
}

/**
 * Mirror progress into runs/{runId} so clients can watch a run live.
 */
export function createFirestoreProgressSink(firestore: Firestore, runId: string): ProgressSink {
  const runRef = firestore.collection('runs').doc(runId);
  return {
    async write(update: ProgressUpdate): Promise<void> {
      const processingProgress: Record<string, unknown> = {
        currentStep: update.currentStep,
        percentComplete: update.percentComplete,
        stepMeta: update.stepMeta,
        stepStartedAt: FieldValue.serverTimestamp()
      };
      if (update.detail) {
        processingProgress.detail = update.detail;
      }
      if (update.errorMessage) {
        processingProgress.errorMessage = update.errorMessage;
      }

      await runRef.set(
        {
          processingProgress,
          processingTimeline: update.timeline,
          updatedAt: FieldValue.serverTimestamp()
        },
        { merge: true }
      );
    }
  };
}
