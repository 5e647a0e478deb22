import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { copyFixtureProject, createTempDir, removeTempDir } from "../__fixtures__/project";
import { writeJSON } from "../utils/file";
import {
  findProjectById,
  findProjectByName,
  listProjects,
  resolveDraftsDir,
} from "./discovery";

describe("project discovery", () => {
  let draftsDir: string;
  let morningDir: string;
  let olderDir: string;
  let draftOnlyDir: string;

  beforeEach(async () => {
    draftsDir = await createTempDir();
    morningDir = await copyFixtureProject(draftsDir);

    olderDir = await copyFixtureProject(draftsDir, "Older");
    await writeJSON(path.join(olderDir, "draft_meta_info.json"), {
      draft_id: "PROJECT-2",
      draft_name: "Older take",
      tm_draft_modified: 1_600_000_000_000_000,
      tm_duration: 65_000_000,
    });

    draftOnlyDir = path.join(draftsDir, "Draft only");
    await writeJSON(path.join(draftOnlyDir, "draft_meta_info.json"), {
      draft_id: "PROJECT-3",
      draft_name: "Draft only",
      tm_draft_modified: 1_800_000_000_000_000,
    });

    await copyFixtureProject(draftsDir, ".trash");
    await fs.mkdir(path.join(draftsDir, "Assets"));
    await fs.writeFile(path.join(draftsDir, "root_meta_info.json"), "{}");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(draftsDir);
  });

  describe("listProjects", () => {
    it("lists editable projects newest first", async () => {
      expect(await listProjects(draftsDir)).toEqual([
        {
          name: "Morning take",
          path: morningDir,
          projectId: "PROJECT-1",
          durationUs: 30_000_000,
          durationFormatted: "0:30",
          modifiedTime: 1_700_000_000_000_000,
          videoCount: 1,
          hasContent: true,
        },
        {
          name: "Older take",
          path: olderDir,
          projectId: "PROJECT-2",
          durationUs: 65_000_000,
          durationFormatted: "1:05",
          modifiedTime: 1_600_000_000_000_000,
          videoCount: 1,
          hasContent: true,
        },
      ]);
    });

    it("includes metadata-only folders on request", async () => {
      const projects = await listProjects(draftsDir, { requireContent: false });

      expect(projects.map((project) => project.name)).toEqual([
        "Draft only",
        "Morning take",
        "Older take",
      ]);
      expect(projects[0]).toMatchObject({
        path: draftOnlyDir,
        hasContent: false,
        videoCount: 0,
        durationFormatted: "0:00",
      });
    });

    it("skips projects it cannot read", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const brokenDir = path.join(draftsDir, "Broken");
      await fs.mkdir(brokenDir);
      await fs.writeFile(path.join(brokenDir, "draft_meta_info.json"), "not json");

      const projects = await listProjects(draftsDir);

      expect(projects).toHaveLength(2);
      expect(warn).toHaveBeenCalledWith(
        "[Project Discovery] skipping unreadable project",
        expect.objectContaining({ path: brokenDir })
      );
    });

    it("returns nothing for a missing folder", async () => {
      expect(await listProjects(path.join(draftsDir, "nope"))).toEqual([]);
    });
  });

  describe("lookup", () => {
    it("finds projects by name", async () => {
      expect(await findProjectByName(draftsDir, "MORNING")).toBe(morningDir);
      expect(await findProjectByName(draftsDir, "Morning", true)).toBeNull();
      expect(await findProjectByName(draftsDir, "Older take", true)).toBe(olderDir);
    });

    it("finds projects by id, including metadata-only ones", async () => {
      expect(await findProjectById(draftsDir, "PROJECT-3")).toBe(draftOnlyDir);
      expect(await findProjectById(draftsDir, "PROJECT-9")).toBeNull();
    });
  });
});

describe("resolveDraftsDir", () => {
  let homeDir: string;

  beforeEach(async () => {
    homeDir = await createTempDir("cutline-home-");
  });

  afterEach(async () => {
    await removeTempDir(homeDir);
  });

  it("prefers the configured folder", async () => {
    expect(await resolveDraftsDir({ draftsDir: "/custom/drafts", homeDir })).toBe(
      "/custom/drafts"
    );
  });

  it("finds the macOS default", async () => {
    const expected = path.join(
      homeDir,
      "Movies",
      "CapCut",
      "User Data",
      "Projects",
      "com.lveditor.draft"
    );
    await fs.mkdir(expected, { recursive: true });

    expect(await resolveDraftsDir({ platform: "darwin", homeDir })).toBe(expected);
  });

  it("tries each Linux location in turn", async () => {
    expect(await resolveDraftsDir({ platform: "linux", homeDir })).toBeNull();

    const expected = path.join(homeDir, ".local", "share", "CapCut", "drafts");
    await fs.mkdir(expected, { recursive: true });

    expect(await resolveDraftsDir({ platform: "linux", homeDir })).toBe(expected);
  });
});
