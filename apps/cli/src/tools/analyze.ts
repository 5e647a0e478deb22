import { detectDuplicateGroups } from "@cutline/ai";
import type { AIConfig } from "@cutline/ai";
import {
  buildCutPlan,
  findParagraphs,
  formatDuration,
  type CutPlan,
  type DuplicateGroup,
  type Paragraph,
  type Transcript,
} from "@cutline/core";

export interface AnalyzeOptions {
  silenceThresholdSec: number;
  minSegmentDurationSec: number;
  detectDuplicates: boolean;
  config?: AIConfig;
}

export interface AnalysisSummary {
  originalDuration: string;
  finalDuration: string;
  timeSaved: string;
  duplicatesRemoved: number;
  silencesRemoved: number;
  keptSegments: number;
}

export interface AnalysisResult {
  paragraphs: Paragraph[];
  duplicateGroups: DuplicateGroup[];
  plan: CutPlan;
  summary: AnalysisSummary;
}

export const summarizeCutPlan = (plan: CutPlan): AnalysisSummary => {
  const { stats } = plan;
  return {
    originalDuration: formatDuration(stats.originalDuration),
    finalDuration: formatDuration(stats.keptDuration),
    timeSaved: formatDuration(stats.removedDuration),
    duplicatesRemoved: stats.removedCount.duplicate,
    silencesRemoved: stats.removedCount.pause,
    keptSegments: stats.keptCount,
  };
};

/**
 * Splits a transcript into paragraphs, optionally asks for duplicate takes,
 * and builds the cut plan.
 */
export const analyze = async (
  transcript: Transcript,
  options: AnalyzeOptions
): Promise<AnalysisResult> => {
  const paragraphs = findParagraphs(transcript, options.silenceThresholdSec);
  const duplicateGroups = options.detectDuplicates
    ? await detectDuplicateGroups(paragraphs, options.config)
    : [];

  const plan = buildCutPlan(transcript, {
    silenceThresholdSec: options.silenceThresholdSec,
    minSegmentDurationSec: options.minSegmentDurationSec,
    duplicateGroups,
  });

  console.log("[Analyze]", {
    paragraphs: paragraphs.length,
    duplicateGroups: duplicateGroups.length,
    keptSegments: plan.stats.keptCount,
    timestamp: new Date().toISOString(),
  });

  return { paragraphs, duplicateGroups, plan, summary: summarizeCutPlan(plan) };
};

export const formatAnalysisSummary = (summary: AnalysisSummary): string =>
  [
    `Original duration: ${summary.originalDuration}`,
    `Final duration: ${summary.finalDuration}`,
    `Time saved: ${summary.timeSaved}`,
    `Duplicates removed: ${summary.duplicatesRemoved}`,
    `Silences removed: ${summary.silencesRemoved}`,
  ].join("\n");
