import { PlanningError } from "../errors";
import { findParagraphs, getAllWords, getSourceDuration } from "../transcript/transcript";
import type {
  CutPlan,
  CutPlanOptions,
  CutSegment,
  CutStats,
} from "../types/cut-plan";
import type { DuplicateGroup, Paragraph, Transcript, Word } from "../types/transcript";

const EPSILON = 1e-9;

const duration = (segment: CutSegment): number =>
  segment.sourceEnd - segment.sourceStart;

const assertValidDuplicateGroups = (
  groups: DuplicateGroup[],
  paragraphCount: number
): void => {
  const owner = new Map<number, number>();

  groups.forEach((group, groupIndex) => {
    const seen = new Set<number>();
    for (const index of group.paragraphIndices) {
      if (!Number.isInteger(index) || index < 0 || index >= paragraphCount) {
        throw new PlanningError(
          `Duplicate group ${groupIndex} references paragraph ${index}, but the transcript has ${paragraphCount} paragraphs`,
          {
            entityId: `group-${groupIndex}`,
            expected: `0..${paragraphCount - 1}`,
            actual: index,
          }
        );
      }
      if (seen.has(index)) {
        throw new PlanningError(
          `Duplicate group ${groupIndex} lists paragraph ${index} more than once`,
          { entityId: `group-${groupIndex}`, actual: group.paragraphIndices }
        );
      }
      const previousOwner = owner.get(index);
      if (previousOwner !== undefined) {
        throw new PlanningError(
          `Paragraph ${index} belongs to duplicate groups ${previousOwner} and ${groupIndex}; groups must be disjoint`,
          { entityId: `group-${groupIndex}`, actual: index }
        );
      }
      seen.add(index);
      owner.set(index, groupIndex);
    }
    if (seen.size < 2) {
      throw new PlanningError(
        `Duplicate group ${groupIndex} needs at least two paragraphs`,
        { entityId: `group-${groupIndex}`, expected: ">= 2", actual: seen.size }
      );
    }
  });
};

/**
 * Every member of a group except the temporally last one is dropped. When two
 * members start at the same time the one listed earlier is dropped.
 */
const findDuplicateDrops = (
  groups: DuplicateGroup[],
  paragraphs: Paragraph[]
): Set<number> => {
  const dropped = new Set<number>();

  for (const group of groups) {
    let keeper: number | null = null;
    for (const index of group.paragraphIndices) {
      const keeperStart: number | null =
        keeper === null ? null : paragraphs[keeper]?.start ?? null;
      const start = paragraphs[index]?.start ?? 0;
      if (keeperStart === null || start >= keeperStart) {
        keeper = index;
      }
    }
    for (const index of group.paragraphIndices) {
      if (index !== keeper) {
        dropped.add(index);
      }
    }
  }

  return dropped;
};

const paragraphWords = (words: Word[], paragraph: Paragraph): Word[] =>
  words.filter(
    (word) => word.start >= paragraph.start && word.start <= paragraph.end
  );

/**
 * Lays paragraphs and the silences between them out as one gap-free sequence
 * over [0, sourceDuration).
 */
const layoutIntervals = (
  paragraphs: Paragraph[],
  duplicateDrops: Set<number>,
  words: Word[],
  sourceDuration: number
): CutSegment[] => {
  const intervals: CutSegment[] = [];
  let cursor = 0;

  for (const paragraph of paragraphs) {
    if (paragraph.start - cursor > EPSILON) {
      // Leading silence or an inter-paragraph gap at or above the threshold
      intervals.push({
        sourceStart: cursor,
        sourceEnd: paragraph.start,
        kept: false,
        reason: "pause",
      });
      cursor = paragraph.start;
    }

    const start = cursor;
    if (paragraph.end - start <= EPSILON) {
      continue;
    }

    const isDuplicate = duplicateDrops.has(paragraph.index);
    const spoken = paragraphWords(words, paragraph);
    intervals.push({
      sourceStart: start,
      sourceEnd: paragraph.end,
      kept: !isDuplicate,
      reason: isDuplicate ? "duplicate" : "kept",
      paragraphIndex: paragraph.index,
      startWord: spoken[0]?.text.trim() ?? "",
      endWord: spoken[spoken.length - 1]?.text.trim() ?? "",
    });
    cursor = paragraph.end;
  }

  const last = intervals[intervals.length - 1];
  if (sourceDuration - cursor > EPSILON) {
    intervals.push({
      sourceStart: cursor,
      sourceEnd: sourceDuration,
      kept: false,
      reason: "pause",
    });
  } else if (last) {
    last.sourceEnd = sourceDuration;
  }

  return intervals;
};

/**
 * Kept intervals shorter than the minimum are folded into a kept neighbour,
 * or dropped as a pause when both neighbours are dropped.
 */
const absorbShortIntervals = (
  intervals: CutSegment[],
  minSegmentDurationSec: number
): CutSegment[] => {
  const result: CutSegment[] = [];

  for (let i = 0; i < intervals.length; i++) {
    const current = intervals[i];
    if (!current) {
      continue;
    }
    if (!current.kept || duration(current) >= minSegmentDurationSec - EPSILON) {
      result.push(current);
      continue;
    }

    const previous = result[result.length - 1];
    if (previous?.kept) {
      previous.sourceEnd = current.sourceEnd;
      previous.endWord = current.endWord;
      continue;
    }

    const next = intervals[i + 1];
    if (next?.kept) {
      next.sourceStart = current.sourceStart;
      next.startWord = current.startWord;
      continue;
    }

    result.push({ ...current, kept: false, reason: "pause" });
  }

  return result;
};

export const computeCutStats = (
  segments: CutSegment[],
  sourceDuration: number
): CutStats => {
  const stats: CutStats = {
    originalDuration: sourceDuration,
    keptDuration: 0,
    removedDuration: 0,
    keptCount: 0,
    removedByReason: { pause: 0, duplicate: 0 },
    removedCount: { pause: 0, duplicate: 0 },
  };

  for (const segment of segments) {
    if (segment.kept) {
      stats.keptDuration += duration(segment);
      stats.keptCount += 1;
      continue;
    }
    const reason = segment.reason === "duplicate" ? "duplicate" : "pause";
    stats.removedDuration += duration(segment);
    stats.removedByReason[reason] += duration(segment);
    stats.removedCount[reason] += 1;
  }

  return stats;
};

/**
 * Derives an ordered, gap-free partition of the source recording into kept
 * and dropped intervals from a word-level transcript and duplicate-take
 * hints.
 */
export const buildCutPlan = (
  transcript: Transcript,
  options: CutPlanOptions
): CutPlan => {
  const { silenceThresholdSec, minSegmentDurationSec } = options;
  const duplicateGroups = options.duplicateGroups ?? [];

  if (transcript.segments.length === 0) {
    throw new PlanningError("Transcript has no segments to plan cuts from", {
      expected: ">= 1 segment",
      actual: 0,
    });
  }
  if (!(silenceThresholdSec >= 0) || !(minSegmentDurationSec >= 0)) {
    throw new PlanningError("Cut plan thresholds must be non-negative numbers", {
      actual: { silenceThresholdSec, minSegmentDurationSec },
    });
  }

  const sourceDuration = getSourceDuration(transcript);
  if (sourceDuration <= 0) {
    throw new PlanningError("Transcript has zero duration", {
      actual: sourceDuration,
    });
  }

  const paragraphs = findParagraphs(transcript, silenceThresholdSec);
  assertValidDuplicateGroups(duplicateGroups, paragraphs.length);

  const intervals = layoutIntervals(
    paragraphs,
    findDuplicateDrops(duplicateGroups, paragraphs),
    getAllWords(transcript),
    sourceDuration
  );
  const segments = absorbShortIntervals(intervals, minSegmentDurationSec);

  return {
    sourceDuration,
    segments,
    stats: computeCutStats(segments, sourceDuration),
  };
};
