import path from "node:path";
import {
  FormatError,
  findProjectByName,
  formatDuration,
  getProjectMetadata,
  getSourceMediaPaths,
  listProjects,
  listTextSegments,
  listVideoSegments,
  loadProject,
  microsecondsToSeconds,
  resolveDraftsDir,
  validateProject,
  fileExists,
  type ProjectInfo,
  type TextSegmentView,
  type VideoSegmentView,
  type Violation,
} from "@cutline/core";

export interface ProjectSummary {
  name: string;
  path: string;
  projectId: string;
  duration: string;
  sourceMedia: string[];
  videoSegments: VideoSegmentView[];
  textSegments: TextSegmentView[];
  violations: Violation[];
}

/**
 * Resolves a project argument: an existing folder is used as is, anything
 * else is looked up by name in the drafts folder.
 */
export const resolveProjectDir = async (
  reference: string,
  draftsDir?: string
): Promise<string> => {
  if (await fileExists(reference)) {
    return path.resolve(reference);
  }

  const dir = await resolveDraftsDir({ draftsDir });
  const match = dir ? await findProjectByName(dir, reference) : null;
  if (!match) {
    throw new FormatError(
      dir
        ? `No project named "${reference}" in ${dir}`
        : `No project folder at ${reference} and no drafts folder found; set CUTLINE_DRAFTS_DIR`,
      { entityId: reference, path: dir ?? undefined }
    );
  }
  return match;
};

export const listDraftProjects = async (
  draftsDir?: string,
  includeIncomplete = false
): Promise<{ draftsDir: string | null; projects: ProjectInfo[] }> => {
  const dir = await resolveDraftsDir({ draftsDir });
  if (!dir) {
    return { draftsDir: null, projects: [] };
  }
  return { draftsDir: dir, projects: await listProjects(dir, { requireContent: !includeIncomplete }) };
};

export const formatProjectList = (projects: ProjectInfo[]): string => {
  if (!projects.length) {
    return "No projects found.";
  }
  return projects
    .map(
      (project) =>
        `${project.name}  [${project.durationFormatted}, ${project.videoCount} video${
          project.videoCount === 1 ? "" : "s"
        }${project.hasContent ? "" : ", not editable"}]\n  ${project.path}`
    )
    .join("\n");
};

export const openProject = async (projectDir: string): Promise<ProjectSummary> => {
  const project = await loadProject(projectDir);
  const metadata = getProjectMetadata(project);

  return {
    name: metadata.name,
    path: project.path,
    projectId: metadata.id,
    duration: formatDuration(microsecondsToSeconds(metadata.durationUs)),
    sourceMedia: getSourceMediaPaths(project),
    videoSegments: listVideoSegments(project),
    textSegments: listTextSegments(project),
    violations: validateProject(project),
  };
};

export const formatProjectSummary = (summary: ProjectSummary): string => {
  const lines = [
    `${summary.name} (${summary.duration})`,
    `  ${summary.path}`,
    `Source media:`,
    ...summary.sourceMedia.map((media) => `  ${media}`),
    `Video segments: ${summary.videoSegments.length}`,
    ...summary.videoSegments.map(
      (segment) =>
        `  ${formatDuration(segment.timelineStart)}-${formatDuration(segment.timelineEnd)}  ${path.basename(segment.sourcePath)} @ ${formatDuration(segment.sourceStart)}`
    ),
    `Text segments: ${summary.textSegments.length}`,
  ];
  if (summary.violations.length) {
    lines.push(
      `Problems:`,
      ...summary.violations.map((violation) => `  [${violation.code}] ${violation.message}`)
    );
  }
  return lines.join("\n");
};
