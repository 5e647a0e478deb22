import path from "node:path";
import {
  PlanningError,
  addTextTrack,
  assertCanModify,
  getProjectMetadata,
  getTimelinePlacements,
  listMaterials,
  loadProject,
  parseTranscript,
  readJSON,
  saveProject,
  type Capabilities,
  type Project,
  type SaveResult,
  type SubtitleLine,
  type TextStyle,
  type Transcript,
} from "@cutline/core";
import type { CutlineConfig } from "../config";
import { generateSubtitles, readSrt } from "./subtitles";
import { getOutputPaths, transcribe } from "./transcribe";

export type SubtitleStyle = "dynamic" | "simple";

export interface AddSubtitlesOptions {
  config: CutlineConfig;
  capabilities?: Capabilities;
  // Cues to place verbatim, in timeline seconds
  srtPath?: string;
  // Transcript of the project's first video, in source seconds
  transcriptPath?: string;
  style?: SubtitleStyle;
  inPlace?: boolean;
  backup?: boolean;
  name?: string;
  language?: string;
  outputRoot?: string;
}

export interface AddSubtitlesResult {
  originalProject: string;
  saved: SaveResult;
  subtitlesAdded: number;
}

export const SUBTITLE_STYLES: Record<SubtitleStyle, Partial<TextStyle>> = {
  // Accent colours and lines alternating between top and bottom
  dynamic: { alternatePositions: true },
  simple: { backgroundColor: "#000000", backgroundAlpha: 0.6 },
};

const firstVideo = (project: Project) => {
  const video = listMaterials(project).find(
    (material) => material.kind === "video" && material.path
  );
  if (!video?.path) {
    throw new PlanningError(`Project ${project.path} has no video to subtitle`, {
      entityId: getProjectMetadata(project).id,
    });
  }
  return { id: video.id, path: video.path };
};

const buildLines = async (
  project: Project,
  options: AddSubtitlesOptions
): Promise<SubtitleLine[]> => {
  if (options.srtPath) {
    return readSrt(options.srtPath);
  }

  const video = firstVideo(project);
  let transcript: Transcript;
  if (options.transcriptPath) {
    transcript = parseTranscript(await readJSON(options.transcriptPath));
  } else {
    const { transcriptFile } = getOutputPaths(video.path, options.outputRoot);
    transcript = await transcribe(video.path, transcriptFile, {
      language: options.language,
      config: options.config.ai,
    });
  }

  return generateSubtitles(transcript, getTimelinePlacements(project, video.id), {
    maxWords: options.config.subtitleMaxWords,
    maxChars: options.config.subtitleMaxChars,
    accents: (options.style ?? "dynamic") === "dynamic",
    config: options.config.ai,
  });
};

/**
 * Adds a subtitle track to an existing project from an SRT file, a
 * transcript, or a fresh transcription of its first video.
 */
export const addSubtitlesToProject = async (
  projectDir: string,
  options: AddSubtitlesOptions
): Promise<AddSubtitlesResult> => {
  const capabilities = options.capabilities ?? options.config.capabilities;
  assertCanModify(capabilities, "capcut", "add-subtitles");

  const project = await loadProject(projectDir);
  const lines = await buildLines(project, options);
  if (!lines.length) {
    throw new PlanningError("No subtitles to add", {
      entityId: getProjectMetadata(project).id,
      expected: ">= 1 line",
      actual: 0,
    });
  }

  const next = addTextTrack(project, lines, SUBTITLE_STYLES[options.style ?? "dynamic"]);
  const saved = options.inPlace
    ? await saveProject(next, { mode: "in-place", backup: options.backup ?? true }, capabilities)
    : await saveProject(
        next,
        {
          mode: "copy",
          draftsDir: path.dirname(project.path),
          name: options.name ?? `${getProjectMetadata(project).name} subtitles`,
        },
        capabilities
      );

  console.log("[Add Subtitles]", {
    project: projectDir,
    saved: saved.path,
    lines: lines.length,
    timestamp: new Date().toISOString(),
  });

  return { originalProject: projectDir, saved, subtitlesAdded: lines.length };
};
