import fs from "node:fs/promises";
import path from "node:path";
import cloneDeep from "lodash/cloneDeep";
import type { ZodError } from "zod";
import { FormatError, IOError } from "../errors";
import {
  CONTENT_FILE_NAMES,
  META_FILE_NAME,
  type ContentFileName,
  type Material,
  type MaterialKind,
  type Project,
  type ProjectMetadata,
  type TextSegmentView,
  type VideoSegmentView,
} from "../types/timeline";
import { fileExists } from "../utils/file";
import { microsecondsToSeconds } from "../utils/time";
import {
  draftContentSchema,
  draftMetaSchema,
  type DraftContent,
  type DraftMeta,
} from "./schema";

const CATEGORY_KINDS: Record<string, MaterialKind> = {
  videos: "video",
  audios: "audio",
  texts: "text",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Text materials store their text inside a JSON-encoded rich-text document.
 */
export const readTextContent = (content: string | undefined): string => {
  if (!content) {
    return "";
  }
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed) && typeof parsed.text === "string") {
      return parsed.text;
    }
    return "";
  } catch {
    // Some versions store plain text instead of a rich-text document
    return content;
  }
};

const toMaterial = (
  category: string,
  entry: Record<string, unknown>,
  id: string
): Material => {
  const kind = CATEGORY_KINDS[category] ?? "other";
  const material: Material = { id, kind, category };
  if (typeof entry.path === "string") {
    material.path = entry.path;
  }
  if (typeof entry.duration === "number") {
    material.durationUs = entry.duration;
  }
  if (kind === "text") {
    material.text = readTextContent(
      typeof entry.content === "string" ? entry.content : undefined
    );
  }
  return material;
};

export const listMaterials = (project: Project): Material[] => {
  const materials: Material[] = [];
  for (const [category, value] of Object.entries(project.content.materials)) {
    if (!Array.isArray(value)) {
      continue;
    }
    for (const entry of value) {
      if (isRecord(entry) && typeof entry.id === "string") {
        materials.push(toMaterial(category, entry, entry.id));
      }
    }
  }
  return materials;
};

/** Resolves a segment's weak material reference. */
export const findMaterial = (
  project: Project,
  materialId: string
): Material | undefined =>
  listMaterials(project).find((material) => material.id === materialId);

export const findMaterialByPath = (
  project: Project,
  mediaPath: string
): Material | undefined => {
  const wanted = path.resolve(mediaPath);
  return listMaterials(project).find(
    (material) =>
      (material.kind === "video" || material.kind === "audio") &&
      material.path !== undefined &&
      path.resolve(material.path) === wanted
  );
};

/** Unique media paths referenced by video materials. */
export const getSourceMediaPaths = (project: Project): string[] => {
  const paths = new Set<string>();
  for (const material of listMaterials(project)) {
    if (material.kind === "video" && material.path) {
      paths.add(material.path);
    }
  }
  return [...paths];
};

export const getProjectMetadata = (project: Project): ProjectMetadata => ({
  id: project.meta.draft_id ?? project.content.id ?? path.basename(project.path),
  name: project.meta.draft_name || project.content.name || "Untitled",
  durationUs: project.content.duration ?? project.meta.tm_duration ?? 0,
  createdAt: project.meta.tm_draft_create,
  modifiedAt: project.meta.tm_draft_modified,
});

const describeIssue = (error: ZodError): string => {
  const issue = error.issues[0];
  if (!issue) {
    return "unknown issue";
  }
  return `${issue.path.join(".") || "<root>"}: ${issue.message}`;
};

/**
 * Builds a Project from already-parsed documents. Throws FormatError when a
 * document does not match the draft format or a segment references a
 * material id that is not defined.
 */
export const parseProject = (
  projectPath: string,
  contentFileName: ContentFileName,
  contentJson: unknown,
  metaJson: unknown
): Project => {
  const content = draftContentSchema.safeParse(contentJson);
  if (!content.success) {
    throw new FormatError(
      `Invalid ${contentFileName} in ${projectPath}: ${describeIssue(content.error)}`,
      { path: path.join(projectPath, contentFileName), issues: content.error.issues }
    );
  }

  const meta = draftMetaSchema.safeParse(metaJson);
  if (!meta.success) {
    throw new FormatError(
      `Invalid ${META_FILE_NAME} in ${projectPath}: ${describeIssue(meta.error)}`,
      { path: path.join(projectPath, META_FILE_NAME), issues: meta.error.issues }
    );
  }

  const project: Project = {
    path: projectPath,
    contentFileName,
    content: content.data,
    meta: meta.data,
  };

  const materialIds = new Set(listMaterials(project).map((material) => material.id));
  for (const track of project.content.tracks) {
    for (const segment of track.segments) {
      if (!materialIds.has(segment.material_id)) {
        throw new FormatError(
          `Segment ${segment.id} on track ${track.id} references undefined material ${segment.material_id}`,
          {
            entityId: segment.id,
            expected: "an id listed under materials",
            actual: segment.material_id,
          }
        );
      }
    }
  }

  return project;
};

const readDocument = async (filePath: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new IOError(`Failed to read ${filePath}`, { path: filePath }, { cause: error });
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new FormatError(
      `${filePath} is not valid JSON`,
      { path: filePath },
      { cause: error }
    );
  }
};

export const findContentFileName = async (
  projectPath: string
): Promise<ContentFileName | null> => {
  for (const name of CONTENT_FILE_NAMES) {
    if (await fileExists(path.join(projectPath, name))) {
      return name;
    }
  }
  return null;
};

/**
 * Loads a project folder. Both the content and the metadata document must be
 * present; a metadata-only folder cannot be edited safely and is rejected.
 */
export const loadProject = async (projectPath: string): Promise<Project> => {
  const contentFileName = await findContentFileName(projectPath);
  const metaPath = path.join(projectPath, META_FILE_NAME);
  const hasMeta = await fileExists(metaPath);

  if (!contentFileName) {
    throw new FormatError(
      hasMeta
        ? `Project ${projectPath} has ${META_FILE_NAME} but no content document; open it in the editor and save once to create ${CONTENT_FILE_NAMES[0]}`
        : `${projectPath} is not a project folder: no content document found`,
      { path: projectPath, expected: CONTENT_FILE_NAMES.join(" or ") }
    );
  }
  if (!hasMeta) {
    throw new FormatError(`Project ${projectPath} is missing ${META_FILE_NAME}`, {
      path: projectPath,
      expected: META_FILE_NAME,
    });
  }

  const contentJson = await readDocument(path.join(projectPath, contentFileName));
  const metaJson = await readDocument(metaPath);

  return parseProject(projectPath, contentFileName, contentJson, metaJson);
};

export interface ProjectDocuments {
  content: DraftContent;
  meta: DraftMeta;
}

export const serializeProject = (project: Project): ProjectDocuments => ({
  content: cloneDeep(project.content),
  meta: cloneDeep(project.meta),
});

/**
 * Sets the project duration to the furthest segment end across all tracks.
 * Mutates the given project.
 */
export const recomputeDuration = (project: Project): void => {
  let maxEnd = 0;
  for (const track of project.content.tracks) {
    for (const segment of track.segments) {
      const { start, duration } = segment.target_timerange;
      maxEnd = Math.max(maxEnd, start + duration);
    }
  }
  project.content.duration = maxEnd;
  project.meta.tm_duration = maxEnd;
};

export const listVideoSegments = (project: Project): VideoSegmentView[] => {
  const materials = new Map(listMaterials(project).map((m) => [m.id, m]));
  const views: VideoSegmentView[] = [];

  for (const track of project.content.tracks) {
    if (track.type !== "video") {
      continue;
    }
    for (const segment of track.segments) {
      const target = segment.target_timerange;
      const source = segment.source_timerange ?? { start: 0, duration: target.duration };
      const timelineStart = microsecondsToSeconds(target.start);
      views.push({
        id: segment.id,
        materialId: segment.material_id,
        sourcePath: materials.get(segment.material_id)?.path ?? "",
        timelineStart,
        timelineEnd: timelineStart + microsecondsToSeconds(target.duration),
        sourceStart: microsecondsToSeconds(source.start),
        sourceEnd: microsecondsToSeconds(source.start + source.duration),
        duration: microsecondsToSeconds(target.duration),
      });
    }
  }

  return views;
};

export const listTextSegments = (project: Project): TextSegmentView[] => {
  const materials = new Map(listMaterials(project).map((m) => [m.id, m]));
  const views: TextSegmentView[] = [];

  for (const track of project.content.tracks) {
    if (track.type !== "text") {
      continue;
    }
    for (const segment of track.segments) {
      const target = segment.target_timerange;
      const timelineStart = microsecondsToSeconds(target.start);
      views.push({
        id: segment.id,
        materialId: segment.material_id,
        text: materials.get(segment.material_id)?.text ?? "",
        timelineStart,
        timelineEnd: timelineStart + microsecondsToSeconds(target.duration),
      });
    }
  }

  return views;
};
