import fs from "node:fs/promises";
import path from "node:path";
import { writeJSON } from "@cutline/core";
import { FIXTURE_VIDEO_PATH, copyFixtureProject } from "@cutline/core/testing";
import { createTalkTranscript } from "./transcript";
import { getOutputPaths } from "../tools/transcribe";

export interface TalkProject {
  projectDir: string;
  mediaPath: string;
  outputRoot: string;
}

/**
 * Copies the fixture project into `draftsDir` with its video pointing at a
 * real (empty) file and a cached transcript for it under `<root>/cache`.
 */
export const prepareTalkProject = async (
  root: string,
  draftsDir: string
): Promise<TalkProject> => {
  const projectDir = await copyFixtureProject(draftsDir);
  const mediaPath = path.join(root, "media", "take.mov");
  const outputRoot = path.join(root, "cache");

  await fs.mkdir(path.dirname(mediaPath), { recursive: true });
  await fs.writeFile(mediaPath, "");

  const contentFile = path.join(projectDir, "draft_info.json");
  const raw = await fs.readFile(contentFile, "utf8");
  await fs.writeFile(
    contentFile,
    raw.replaceAll(JSON.stringify(FIXTURE_VIDEO_PATH), JSON.stringify(mediaPath))
  );

  await writeJSON(getOutputPaths(mediaPath, outputRoot).transcriptFile, createTalkTranscript());

  return { projectDir, mediaPath, outputRoot };
};
