import fs from "node:fs/promises";
import path from "node:path";
import { assertCanModify, type Capabilities } from "../capabilities";
import { CutlineError, IOError } from "../errors";
import { getProjectMetadata, loadProject, serializeProject } from "../timeline/project";
import type { DraftContent, DraftMeta } from "../timeline/schema";
import { META_FILE_NAME, type Project } from "../types/timeline";
import { fileExists } from "../utils/file";
import { generateId } from "../utils/ids";

const STAGING_MARKER = ".cutline-staging";
const MAX_FOLDER_NAME_LENGTH = 100;

export interface CopySaveOptions {
  mode: "copy";
  // Folder the new project directory is created in
  draftsDir: string;
  name?: string;
}

export interface InPlaceSaveOptions {
  mode: "in-place";
  // Defaults to the folder the project was loaded from
  targetDir?: string;
  // Set to false only when a known-good copy of the original exists elsewhere
  backup?: boolean;
}

export type SaveOptions = CopySaveOptions | InPlaceSaveOptions;

export interface SaveResult {
  path: string;
  projectId: string;
  name: string;
  backupPath?: string;
}

/**
 * Folder name for a project: the display name with characters that are not
 * allowed in file names replaced.
 */
export const projectFolderName = (name: string): string => {
  const cleaned = name
    .replace(/[\u0000-\u001f/\\:*?"<>|]/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^\.+/, "")
    .slice(0, MAX_FOLDER_NAME_LENGTH)
    .trim();
  return cleaned || "Untitled";
};

const resolveFolderName = async (draftsDir: string, base: string): Promise<string> => {
  let candidate = base;
  for (let suffix = 2; await fileExists(path.join(draftsDir, candidate)); suffix++) {
    candidate = `${base} (${suffix})`;
  }
  return candidate;
};

/**
 * Returns `now` in the unit an existing timestamp uses. The host writes
 * microseconds in recent versions and seconds in older ones.
 */
export const touchTimestamp = (previous: number | undefined, nowMs: number): number => {
  if (previous !== undefined && previous > 1e14) {
    return nowMs * 1000;
  }
  if (previous !== undefined && previous > 1e11) {
    return nowMs;
  }
  return Math.floor(nowMs / 1000);
};

const formatStamp = (date: Date): string => {
  const pad = (value: number) => value.toString().padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
};

const prepareDocuments = (
  project: Project,
  nowMs: number
): { content: DraftContent; meta: DraftMeta } => {
  const { content, meta } = serializeProject(project);
  content.update_time = touchTimestamp(content.update_time, nowMs);
  meta.tm_draft_modified = touchTimestamp(meta.tm_draft_modified, nowMs);
  if (content.duration !== undefined) {
    meta.tm_duration = content.duration;
  }
  return { content, meta };
};

const toIOError = (error: unknown, message: string, target: string): CutlineError =>
  error instanceof CutlineError
    ? error
    : new IOError(`${message}: ${error instanceof Error ? error.message : String(error)}`, { path: target }, { cause: error });

/**
 * True when an in-place write into `targetDir` would replace a media file
 * the project plays from.
 */
const touchesSourceMedia = (project: Project, targetDir: string): boolean => {
  const target = path.resolve(targetDir);
  const written = new Set([
    target,
    path.join(target, project.contentFileName),
    path.join(target, META_FILE_NAME),
  ]);
  const { videos = [], audios = [] } = project.content.materials;
  return [...videos, ...audios].some(
    (material) => material.path !== undefined && written.has(path.resolve(material.path))
  );
};

const saveCopy = async (
  project: Project,
  options: CopySaveOptions,
  capabilities: Capabilities
): Promise<SaveResult> => {
  assertCanModify(capabilities, "capcut", "Saving a project copy");

  const nowMs = Date.now();
  const draftsDir = path.resolve(options.draftsDir);
  const name = options.name ?? `${getProjectMetadata(project).name} copy`;
  const folder = await resolveFolderName(draftsDir, projectFolderName(name));
  const finalPath = path.join(draftsDir, folder);
  // Dot-prefixed so the editor's folder watcher does not pick it up as a project
  const stagingPath = path.join(draftsDir, `.${folder}${STAGING_MARKER}-${nowMs}`);
  const projectId = generateId();

  console.log("[Project Save]", {
    mode: "copy",
    source: project.path,
    target: finalPath,
    timestamp: new Date(nowMs).toISOString(),
  });

  try {
    await fs.mkdir(draftsDir, { recursive: true });
    if (await fileExists(project.path)) {
      await fs.cp(project.path, stagingPath, {
        recursive: true,
        filter: (source) => !path.basename(source).includes(STAGING_MARKER),
      });
    } else {
      await fs.mkdir(stagingPath, { recursive: true });
    }

    const { content, meta } = prepareDocuments(project, nowMs);
    content.id = projectId;
    content.name = name;
    meta.draft_id = projectId;
    meta.draft_name = name;
    meta.draft_fold_path = finalPath;
    meta.draft_root_path = draftsDir;
    meta.tm_draft_create = touchTimestamp(meta.tm_draft_create, nowMs);

    await fs.writeFile(path.join(stagingPath, project.contentFileName), JSON.stringify(content));
    await fs.writeFile(path.join(stagingPath, META_FILE_NAME), JSON.stringify(meta));

    // Single publish step: the project appears complete or not at all
    await fs.rename(stagingPath, finalPath);
  } catch (error) {
    await fs.rm(stagingPath, { recursive: true, force: true });
    console.error("[Project Save Error]", {
      mode: "copy",
      target: finalPath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw toIOError(error, `Failed to save project copy to ${finalPath}`, finalPath);
  }

  return { path: finalPath, projectId, name };
};

/**
 * Copies the project as it currently exists on disk next to itself, under
 * `<name> backup <yyyyMMdd-HHmmss>`.
 */
export const backupProject = async (
  projectDir: string,
  capabilities: Capabilities
): Promise<SaveResult> => {
  const pristine = await loadProject(projectDir);
  const { name } = getProjectMetadata(pristine);
  const result = await saveCopy(
    pristine,
    {
      mode: "copy",
      draftsDir: path.dirname(path.resolve(projectDir)),
      name: `${name} backup ${formatStamp(new Date())}`,
    },
    capabilities
  );
  console.log("[Project Backup]", { source: projectDir, backup: result.path });
  return result;
};

interface StagedDocument {
  document: unknown;
  staging: string;
  // Where the canonical document waits until every swap succeeded
  previous: string;
  final: string;
}

interface SwappedDocument extends StagedDocument {
  hadPrevious: boolean;
  installed: boolean;
}

/**
 * Puts every moved-aside document back at its canonical path, newest swap
 * first. Returns the first failure instead of throwing so the caller can
 * report the original error.
 */
const rollBackSwaps = async (swapped: SwappedDocument[]): Promise<unknown> => {
  let failure: unknown;
  for (const swap of [...swapped].reverse()) {
    try {
      if (swap.hadPrevious) {
        await fs.rename(swap.previous, swap.final);
      } else if (swap.installed) {
        await fs.rm(swap.final, { force: true });
      }
    } catch (error) {
      if (failure === undefined) {
        failure = error;
      }
    }
  }
  return failure;
};

const saveInPlace = async (
  project: Project,
  options: InPlaceSaveOptions,
  capabilities: Capabilities
): Promise<SaveResult> => {
  const targetDir = path.resolve(options.targetDir ?? project.path);

  assertCanModify(capabilities, "capcut", "Saving a project in place");
  if (touchesSourceMedia(project, targetDir)) {
    assertCanModify(capabilities, "source", `Overwriting source media at ${targetDir}`);
  }

  const backupPath =
    options.backup === false
      ? undefined
      : (await backupProject(targetDir, capabilities)).path;

  const nowMs = Date.now();
  const { content, meta } = prepareDocuments(project, nowMs);
  const documents: Array<[string, unknown]> = [
    [project.contentFileName, content],
    [META_FILE_NAME, meta],
  ];
  const staged: StagedDocument[] = documents.map(([fileName, document]) => ({
    document,
    staging: path.join(targetDir, `.${fileName}${STAGING_MARKER}`),
    previous: path.join(targetDir, `.${fileName}${STAGING_MARKER}-previous`),
    final: path.join(targetDir, fileName),
  }));
  const swapped: SwappedDocument[] = [];

  console.log("[Project Save]", {
    mode: "in-place",
    target: targetDir,
    backup: backupPath,
    timestamp: new Date(nowMs).toISOString(),
  });

  try {
    // Stage every document before replacing any of them
    for (const entry of staged) {
      await fs.writeFile(entry.staging, JSON.stringify(entry.document));
    }
    for (const entry of staged) {
      const hadPrevious = await fileExists(entry.final);
      if (hadPrevious) {
        await fs.rename(entry.final, entry.previous);
      }
      const swap: SwappedDocument = { ...entry, hadPrevious, installed: false };
      swapped.push(swap);
      await fs.rename(entry.staging, entry.final);
      swap.installed = true;
    }
  } catch (error) {
    const rollbackError = await rollBackSwaps(swapped);
    await Promise.all(staged.map(({ staging }) => fs.rm(staging, { force: true })));
    console.error("[Project Save Error]", {
      mode: "in-place",
      target: targetDir,
      error: error instanceof Error ? error.message : String(error),
      ...(rollbackError ? { rollbackError: String(rollbackError) } : {}),
    });
    throw toIOError(error, `Failed to save project in place at ${targetDir}`, targetDir);
  }

  await Promise.all(swapped.map(({ previous }) => fs.rm(previous, { force: true })));

  return {
    path: targetDir,
    projectId: meta.draft_id ?? content.id ?? path.basename(targetDir),
    name: getProjectMetadata(project).name,
    ...(backupPath ? { backupPath } : {}),
  };
};

/**
 * Persists a project. `copy` publishes a new, independent project folder
 * with one rename; `in-place` backs up the original first and then swaps
 * each document into place from a fully written staging file. Both check
 * the capability gate before touching the disk.
 */
export const saveProject = (
  project: Project,
  options: SaveOptions,
  capabilities: Capabilities
): Promise<SaveResult> =>
  options.mode === "copy"
    ? saveCopy(project, options, capabilities)
    : saveInPlace(project, options, capabilities);
