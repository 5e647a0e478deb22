import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { findContentFileName } from "../timeline/project";
import { META_FILE_NAME } from "../types/timeline";
import { fileExists, readJSON } from "../utils/file";
import { formatDuration, microsecondsToSeconds } from "../utils/time";

export interface ProjectInfo {
  name: string;
  path: string;
  projectId: string;
  durationUs: number;
  durationFormatted: string;
  modifiedTime: number;
  videoCount: number;
  // False for metadata-only folders, which cannot be edited
  hasContent: boolean;
}

export interface DraftsDirOptions {
  draftsDir?: string;
  platform?: NodeJS.Platform;
  homeDir?: string;
}

const DRAFTS_SUBPATH = ["CapCut", "User Data", "Projects", "com.lveditor.draft"];

/**
 * The host editor's drafts folder: the configured one, else the platform
 * default when it exists.
 */
export const resolveDraftsDir = async (
  options: DraftsDirOptions = {}
): Promise<string | null> => {
  if (options.draftsDir) {
    return options.draftsDir;
  }

  const home = options.homeDir ?? os.homedir();
  const platform = options.platform ?? process.platform;
  let candidates: string[];

  if (platform === "darwin") {
    candidates = [path.join(home, "Movies", ...DRAFTS_SUBPATH)];
  } else if (platform === "win32") {
    candidates = [path.join(home, "AppData", "Local", ...DRAFTS_SUBPATH)];
  } else {
    candidates = [
      path.join(home, ".capcut", "drafts"),
      path.join(home, ".local", "share", "CapCut", "drafts"),
      path.join(home, "CapCut", "drafts"),
    ];
  }

  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate;
    }
  }
  return null;
};

const metaSummarySchema = z
  .object({
    draft_id: z.string().optional(),
    draft_name: z.string().optional(),
    tm_duration: z.number().optional(),
    tm_draft_modified: z.number().optional(),
  })
  .passthrough();

const contentSummarySchema = z
  .object({
    materials: z
      .object({ videos: z.array(z.unknown()).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const readProjectInfo = async (projectDir: string): Promise<ProjectInfo> => {
  const meta = metaSummarySchema.parse(await readJSON(path.join(projectDir, META_FILE_NAME)));
  const contentFileName = await findContentFileName(projectDir);

  let videoCount = 0;
  if (contentFileName) {
    const content = contentSummarySchema.safeParse(
      await readJSON(path.join(projectDir, contentFileName))
    );
    videoCount = content.success ? content.data.materials?.videos?.length ?? 0 : 0;
  }

  const durationUs = meta.tm_duration ?? 0;
  return {
    name: meta.draft_name ?? "Untitled",
    path: projectDir,
    projectId: meta.draft_id ?? path.basename(projectDir),
    durationUs,
    durationFormatted: formatDuration(microsecondsToSeconds(durationUs)),
    modifiedTime: meta.tm_draft_modified ?? 0,
    videoCount,
    hasContent: contentFileName !== null,
  };
};

/**
 * Projects in a drafts folder, newest first. Folders without metadata are
 * not projects; metadata-only folders are listed only when
 * `requireContent` is false.
 */
export const listProjects = async (
  draftsDir: string,
  options: { requireContent?: boolean } = {}
): Promise<ProjectInfo[]> => {
  const requireContent = options.requireContent ?? true;
  if (!(await fileExists(draftsDir))) {
    return [];
  }

  const entries = await fs.readdir(draftsDir, { withFileTypes: true });
  const projects: ProjectInfo[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory() || entry.name.startsWith(".")) {
      continue;
    }
    const projectDir = path.join(draftsDir, entry.name);
    if (!(await fileExists(path.join(projectDir, META_FILE_NAME)))) {
      continue;
    }

    try {
      const info = await readProjectInfo(projectDir);
      if (info.hasContent || !requireContent) {
        projects.push(info);
      }
    } catch (error) {
      console.warn("[Project Discovery] skipping unreadable project", {
        path: projectDir,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return projects.sort((a, b) => b.modifiedTime - a.modifiedTime);
};

export const findProjectByName = async (
  draftsDir: string,
  name: string,
  exactMatch = false
): Promise<string | null> => {
  const wanted = name.toLowerCase();
  const projects = await listProjects(draftsDir);
  const match = projects.find((project) =>
    exactMatch ? project.name === name : project.name.toLowerCase().includes(wanted)
  );
  return match?.path ?? null;
};

export const findProjectById = async (
  draftsDir: string,
  projectId: string
): Promise<string | null> => {
  const projects = await listProjects(draftsDir, { requireContent: false });
  return projects.find((project) => project.projectId === projectId)?.path ?? null;
};
