/**
 * Speaker Refinement Engine
 *
 * The diarization model over-segments on purpose: a two-person interview can
 * come back with seven speaker labels. This module repairs that in four
 * ordered stages, each relying on what the previous one established:
 *
 * 1. Degenerate-segment merge - slivers under minSegmentSeconds join the
 *    segment before them (or after them, at the very start)
 * 2. Major-speaker classification - speakers above a share of speech time
 * 3. Interjection reattribution - short minor-speaker segments sandwiched
 *    between two segments of the same major speaker take that speaker
 * 4. Residual-minority absorption - speakers with a negligible share are
 *    reassigned, segment by segment, to the nearest major speaker in time
 *
 * The number of distinct speakers never goes up and total speech time never
 * goes down. When stray speakers survive, the run is flagged, not forced.
 */

import { log } from './logger';
import { createTimeSpan, spanDuration } from './types';
import type { QualityFlag, Segment, SpeakerProfile, SpeakerRefinementReport } from './types';
import type { RefinementConfig } from './config';

export interface RefinementResult {
  segments: Segment[];
  report: SpeakerRefinementReport;
  qualityFlags: QualityFlag[];
}

// =============================================================================
// Derived Views
// =============================================================================

/**
 * Per-speaker totals over attributed segments, largest share first.
 */
export function buildSpeakerProfiles(segments: Segment[]): SpeakerProfile[] {
  const totals = new Map<string, { segmentCount: number; totalDuration: number }>();
  let attributed = 0;

  for (const segment of segments) {
    if (segment.speakerId === null) {
      continue;
    }
    const duration = spanDuration(segment.span);
    const entry = totals.get(segment.speakerId) ?? { segmentCount: 0, totalDuration: 0 };
    entry.segmentCount++;
    entry.totalDuration += duration;
    totals.set(segment.speakerId, entry);
    attributed += duration;
  }

  return [...totals.entries()]
    .map(([speakerId, entry]) => ({
      speakerId,
      segmentCount: entry.segmentCount,
      totalDuration: entry.totalDuration,
      shareOfTotal: attributed > 0 ? entry.totalDuration / attributed : 0
    }))
    .sort((a, b) => b.shareOfTotal - a.shareOfTotal || a.speakerId.localeCompare(b.speakerId));
}

export function countDistinctSpeakers(segments: Segment[]): number {
  return new Set(segments.flatMap(s => (s.speakerId === null ? [] : [s.speakerId]))).size;
}

/**
 * Summed duration of every segment. Overlapping speech counts once per
 * segment.
 */
export function totalSpeechSeconds(segments: Segment[]): number {
  return segments.reduce((total, segment) => total + spanDuration(segment.span), 0);
}

/**
 * Major-speaker share threshold scaled to how many speakers diarization
 * reported: the more labels, the smaller a real participant's share can be.
 */
export function adaptiveMajorThreshold(speakerCount: number): number {
  if (speakerCount <= 2) return 0.10;
  if (speakerCount <= 4) return 0.05;
  if (speakerCount <= 8) return 0.03;
  return 0.02;
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

// =============================================================================
// Stages
// =============================================================================

function wordWeightedConfidence(a: Segment, b: Segment): number {
  const aWords = Math.max(1, wordCount(a.text));
  const bWords = Math.max(1, wordCount(b.text));
  return (a.wordConfidence * aWords + b.wordConfidence * bWords) / (aWords + bWords);
}

/**
 * Stage 1: fold segments shorter than the minimum into their predecessor,
 * or into the following segment when there is no predecessor yet.
 *
 * A sliver that overlaps the segment it would join only takes that
 * segment's speaker; joining the spans would drop the overlapping speech
 * from the total.
 */
export function mergeDegenerateSegments(
  segments: Segment[],
  minSegmentSeconds: number
): { segments: Segment[]; merged: number } {
  const output: Segment[] = [];
  let merged = 0;

  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (spanDuration(segment.span) >= minSegmentSeconds) {
      output.push({ ...segment });
      continue;
    }

    const previous = output[output.length - 1];
    if (previous !== undefined) {
      merged++;
      if (segment.span.start < previous.span.end) {
        output.push({ ...segment, speakerId: previous.speakerId });
        continue;
      }
      output[output.length - 1] = {
        ...previous,
        span: createTimeSpan(previous.span.start, segment.span.end),
        text: `${previous.text} ${segment.text}`.trim(),
        wordConfidence: wordWeightedConfidence(previous, segment)
      };
      continue;
    }

    const next = segments[i + 1];
    if (next === undefined) {
      output.push({ ...segment });
      continue;
    }

    merged++;
    if (next.span.start < segment.span.end) {
      output.push({ ...segment, speakerId: next.speakerId });
      continue;
    }
    output.push({
      ...next,
      span: createTimeSpan(segment.span.start, next.span.end),
      text: `${segment.text} ${next.text}`.trim(),
      wordConfidence: wordWeightedConfidence(segment, next)
    });
    i++;
  }

  return { segments: output, merged };
}

/**
 * Stage 3: reattribute short minor-speaker segments whose two neighbours
 * belong to the same major speaker. Neighbours are read from the input, so
 * the result does not depend on the order segments are visited.
 */
export function reattributeInterjections(
  segments: Segment[],
  majors: ReadonlySet<string>,
  config: RefinementConfig
): { segments: Segment[]; reattributed: number } {
  let reattributed = 0;

  const output = segments.map((segment, i) => {
    const previous = segments[i - 1];
    const next = segments[i + 1];
    if (
      previous === undefined ||
      next === undefined ||
      segment.speakerId === null ||
      majors.has(segment.speakerId) ||
      spanDuration(segment.span) >= config.interjectionMaxSeconds ||
      wordCount(segment.text) > config.interjectionMaxWords
    ) {
      return segment;
    }
    if (previous.speakerId === null || previous.speakerId !== next.speakerId || !majors.has(previous.speakerId)) {
      return segment;
    }
    reattributed++;
    return { ...segment, speakerId: previous.speakerId };
  });

  return { segments: output, reattributed };
}

/**
 * Stage 4: reassign every segment of a residual speaker to the major speaker
 * of the nearest major segment. Distance is the silence between the two
 * spans; ties go to the earlier segment.
 */
export function absorbResidualSpeakers(
  segments: Segment[],
  majors: ReadonlySet<string>,
  residual: ReadonlySet<string>
): { segments: Segment[]; reassigned: number } {
  const n = segments.length;
  const isMajor = (segment: Segment): boolean =>
    segment.speakerId !== null && majors.has(segment.speakerId);

  // Nearest preceding anchor: the major segment before i that ends latest
  const before: Array<Segment | null> = new Array<Segment | null>(n).fill(null);
  let latest: Segment | null = null;
  for (let i = 0; i < n; i++) {
    before[i] = latest;
    const segment = segments[i];
    if (isMajor(segment) && (latest === null || segment.span.end > latest.span.end)) {
      latest = segment;
    }
  }

  // Nearest following anchor: segments are ordered by start, so the first
  // major segment after i starts earliest
  const after: Array<Segment | null> = new Array<Segment | null>(n).fill(null);
  let upcoming: Segment | null = null;
  for (let i = n - 1; i >= 0; i--) {
    after[i] = upcoming;
    if (isMajor(segments[i])) {
      upcoming = segments[i];
    }
  }

  let reassigned = 0;
  const output = segments.map((segment, i) => {
    if (segment.speakerId === null || !residual.has(segment.speakerId)) {
      return segment;
    }
    const previous = before[i];
    const next = after[i];
    const previousGap = previous ? Math.max(0, segment.span.start - previous.span.end) : Number.POSITIVE_INFINITY;
    const nextGap = next ? Math.max(0, next.span.start - segment.span.end) : Number.POSITIVE_INFINITY;
    const anchor = previousGap <= nextGap ? previous : next;
    if (!anchor || anchor.speakerId === null) {
      return segment;
    }
    reassigned++;
    return { ...segment, speakerId: anchor.speakerId };
  });

  return { segments: output, reassigned };
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Run all four stages over one recording's ordered segments.
 * The input array and its segments are not modified.
 */
export function refineSpeakers(segments: Segment[], config: RefinementConfig): RefinementResult {
  const originalSpeakerCount = countDistinctSpeakers(segments);
  const speechSecondsBefore = totalSpeechSeconds(segments);

  const stage1 = mergeDegenerateSegments(segments, config.minSegmentSeconds);

  const majorShareThreshold = config.adaptiveMajorThreshold
    ? adaptiveMajorThreshold(originalSpeakerCount)
    : config.majorShareThreshold;
  const profiles = buildSpeakerProfiles(stage1.segments);
  const majors = new Set(profiles.filter(p => p.shareOfTotal > majorShareThreshold).map(p => p.speakerId));

  const stage3 = reattributeInterjections(stage1.segments, majors, config);

  const residualShareThreshold = Math.min(config.residualShareThreshold, majorShareThreshold);
  const residual = new Set(
    buildSpeakerProfiles(stage3.segments)
      .filter(p => !majors.has(p.speakerId) && p.shareOfTotal < residualShareThreshold)
      .map(p => p.speakerId)
  );
  const stage4 = majors.size > 0
    ? absorbResidualSpeakers(stage3.segments, majors, residual)
    : { segments: stage3.segments, reassigned: 0 };

  const refined = stage4.segments;
  const finalProfiles = buildSpeakerProfiles(refined);
  const survivors = finalProfiles.filter(p => !majors.has(p.speakerId)).map(p => p.speakerId);

  const report: SpeakerRefinementReport = {
    originalSpeakerCount,
    finalSpeakerCount: finalProfiles.length,
    majorShareThreshold,
    majorSpeakers: [...majors].sort(),
    degenerateSegmentsMerged: stage1.merged,
    interjectionsReattributed: stage3.reattributed,
    residualSegmentsReassigned: stage4.reassigned,
    speechSecondsBefore,
    speechSecondsAfter: totalSpeechSeconds(refined)
  };

  const qualityFlags: QualityFlag[] = [];
  const overExpected = config.maxExpectedSpeakers !== null && finalProfiles.length > config.maxExpectedSpeakers;
  if (survivors.length > 0 || overExpected) {
    qualityFlags.push({
      code: 'speaker_refinement_not_converged',
      message: majors.size === 0
        ? 'No speaker holds a major share of speech; attributions left as diarized'
        : `${finalProfiles.length} speakers remain after refinement`,
      details: {
        finalSpeakerCount: finalProfiles.length,
        majorSpeakers: report.majorSpeakers,
        unresolvedSpeakers: survivors,
        maxExpectedSpeakers: config.maxExpectedSpeakers
      }
    });
    log.warn('[SpeakerRefinement] Refinement did not converge', {
      finalSpeakerCount: finalProfiles.length,
      unresolvedSpeakers: survivors
    });
  }

  log.info('[SpeakerRefinement] Speakers refined', { ...report });

  return { segments: refined, report, qualityFlags };
}
