import path from "node:path";
import {
  ApplyError,
  addTextTrack,
  applyCutPlan,
  assertCanModify,
  fileExists,
  formatDuration,
  getProjectMetadata,
  getTimelinePlacements,
  listMaterials,
  loadProject,
  saveProject,
  type Capabilities,
  type SaveResult,
  type SubtitleLine,
  type Transcript,
} from "@cutline/core";
import type { CutlineConfig } from "../config";
import { analyze, summarizeCutPlan } from "./analyze";
import { generateSubtitles } from "./subtitles";
import { getOutputPaths, transcribe } from "./transcribe";

export interface SmartCutProjectOptions {
  config: CutlineConfig;
  // Overrides the configured gate; defaults to config.capabilities
  capabilities?: Capabilities;
  inPlace?: boolean;
  // Skip the backup of an in-place save
  backup?: boolean;
  name?: string;
  language?: string;
  detectDuplicates?: boolean;
  addSubtitles?: boolean;
  outputRoot?: string;
}

export interface SmartCutProjectResult {
  originalProject: string;
  saved: SaveResult;
  videosProcessed: number;
  skippedMedia: string[];
  subtitlesAdded: number;
  stats: {
    originalDuration: string;
    finalDuration: string;
    timeSaved: string;
    duplicatesRemoved: number;
    silencesRemoved: number;
  };
}

/**
 * Removes pauses and duplicate takes from every source video of an existing
 * project, optionally adds subtitles, and saves the result as a copy (or in
 * place, after a backup).
 */
export const smartCutProject = async (
  projectDir: string,
  options: SmartCutProjectOptions
): Promise<SmartCutProjectResult> => {
  const { config } = options;
  const capabilities = options.capabilities ?? config.capabilities;
  assertCanModify(capabilities, "capcut", "smart-cut");

  let project = await loadProject(projectDir);
  const { name } = getProjectMetadata(project);

  const totals = { original: 0, kept: 0, duplicates: 0, silences: 0 };
  const processed: Array<{ materialId: string; transcript: Transcript }> = [];
  const skippedMedia: string[] = [];

  const videos = listMaterials(project).filter(
    (material) => material.kind === "video" && material.path
  );

  for (const material of videos) {
    const mediaPath = material.path ?? "";
    if (!(await fileExists(mediaPath))) {
      console.warn("[Smart Cut] source media not found, skipping", { path: mediaPath });
      skippedMedia.push(mediaPath);
      continue;
    }

    const { transcriptFile } = getOutputPaths(mediaPath, options.outputRoot);
    const transcript = await transcribe(mediaPath, transcriptFile, {
      language: options.language,
      config: config.ai,
    });
    if (!transcript.segments.length) {
      console.warn("[Smart Cut] no speech in source, skipping", { path: mediaPath });
      skippedMedia.push(mediaPath);
      continue;
    }

    const { plan } = await analyze(transcript, {
      silenceThresholdSec: config.silenceThresholdSec,
      minSegmentDurationSec: config.minSegmentDurationSec,
      detectDuplicates: options.detectDuplicates ?? true,
      config: config.ai,
    });

    project = applyCutPlan(project, plan, material.id);
    processed.push({ materialId: material.id, transcript });

    totals.original += plan.stats.originalDuration;
    totals.kept += plan.stats.keptDuration;
    totals.duplicates += plan.stats.removedCount.duplicate;
    totals.silences += plan.stats.removedCount.pause;

    console.log("[Smart Cut]", {
      material: material.id,
      path: mediaPath,
      ...summarizeCutPlan(plan),
      timestamp: new Date().toISOString(),
    });
  }

  if (!processed.length) {
    throw new ApplyError(`No source video of ${projectDir} could be processed`, {
      entityId: getProjectMetadata(project).id,
      expected: "at least one readable video with speech",
      actual: skippedMedia,
    });
  }

  // Placements are read after every cut, since cutting one video moves the
  // segments that follow it on a shared track
  let subtitles: SubtitleLine[] = [];
  if (options.addSubtitles) {
    for (const { materialId, transcript } of processed) {
      const lines = await generateSubtitles(
        transcript,
        getTimelinePlacements(project, materialId),
        {
          maxWords: config.subtitleMaxWords,
          maxChars: config.subtitleMaxChars,
          accents: true,
          config: config.ai,
        }
      );
      subtitles = subtitles.concat(lines);
    }
    subtitles.sort((a, b) => a.start - b.start);
    project = addTextTrack(project, subtitles, { alternatePositions: true });
  }

  const saved = options.inPlace
    ? await saveProject(
        project,
        { mode: "in-place", backup: options.backup ?? true },
        capabilities
      )
    : await saveProject(
        project,
        {
          mode: "copy",
          draftsDir: path.dirname(project.path),
          name: options.name ?? `${name} smart cut`,
        },
        capabilities
      );

  return {
    originalProject: projectDir,
    saved,
    videosProcessed: processed.length,
    skippedMedia,
    subtitlesAdded: subtitles.length,
    stats: {
      originalDuration: formatDuration(totals.original),
      finalDuration: formatDuration(totals.kept),
      timeSaved: formatDuration(totals.original - totals.kept),
      duplicatesRemoved: totals.duplicates,
      silencesRemoved: totals.silences,
    },
  };
};

export const formatSmartCutResult = (result: SmartCutProjectResult): string => {
  const lines = [
    "Smart cut complete.",
    "",
    `  Original duration: ${result.stats.originalDuration}`,
    `  Final duration: ${result.stats.finalDuration}`,
    `  Time saved: ${result.stats.timeSaved}`,
    `  Duplicates removed: ${result.stats.duplicatesRemoved}`,
    `  Silences removed: ${result.stats.silencesRemoved}`,
    `  Videos processed: ${result.videosProcessed}`,
  ];
  if (result.subtitlesAdded) {
    lines.push(`  Subtitles added: ${result.subtitlesAdded}`);
  }
  lines.push("", `Saved to ${result.saved.path}`);
  if (result.saved.backupPath) {
    lines.push(`Backup at ${result.saved.backupPath}`);
  }
  return lines.join("\n");
};
