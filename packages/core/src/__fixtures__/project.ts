import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

// A single-take talking-head draft: one 30s video, a music bed and a title
export const FIXTURE_PROJECT_DIR = fileURLToPath(new URL("./talking-head", import.meta.url));
export const FIXTURE_VIDEO_ID = "VIDEO-1";
export const FIXTURE_VIDEO_PATH = "/media/take.mov";

export const createTempDir = (prefix = "cutline-test-") =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

export const removeTempDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

/** Copies the fixture project into `draftsDir` and returns its folder. */
export const copyFixtureProject = async (
  draftsDir: string,
  folder = "Morning take"
): Promise<string> => {
  const target = path.join(draftsDir, folder);
  await fs.cp(FIXTURE_PROJECT_DIR, target, { recursive: true });
  return target;
};

export const readFixtureDocument = async (fileName: string): Promise<unknown> =>
  JSON.parse(await fs.readFile(path.join(FIXTURE_PROJECT_DIR, fileName), "utf8"));
