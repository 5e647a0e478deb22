import type { DuplicateGroup } from "./transcript";

export type CutReason = "pause" | "duplicate" | "kept";

export interface CutSegment {
  // Seconds in the source recording, half-open [sourceStart, sourceEnd)
  sourceStart: number;
  sourceEnd: number;
  kept: boolean;
  reason: CutReason;
  // Paragraph the interval was derived from; absent for silence gaps
  paragraphIndex?: number;
  startWord?: string;
  endWord?: string;
}

export interface CutStats {
  originalDuration: number;
  keptDuration: number;
  removedDuration: number;
  keptCount: number;
  removedByReason: Record<Exclude<CutReason, "kept">, number>;
  removedCount: Record<Exclude<CutReason, "kept">, number>;
}

export interface CutPlan {
  sourceDuration: number;
  segments: CutSegment[];
  stats: CutStats;
}

export interface CutPlanOptions {
  silenceThresholdSec: number;
  minSegmentDurationSec: number;
  duplicateGroups?: DuplicateGroup[];
}
