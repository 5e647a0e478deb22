import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  createCapabilities,
  listTextSegments,
  listVideoSegments,
  loadProject,
} from "@cutline/core";
import { copyFixtureProject, createTempDir, removeTempDir } from "@cutline/core/testing";
import { createTestConfig } from "../__fixtures__/config";
import { prepareTalkProject, type TalkProject } from "../__fixtures__/project";

const { detectDuplicateGroupsMock, identifyAccentWordsBatchMock, transcribeAudioMock } =
  vi.hoisted(() => ({
    detectDuplicateGroupsMock: vi.fn(),
    identifyAccentWordsBatchMock: vi.fn(),
    transcribeAudioMock: vi.fn(),
  }));

vi.mock("@cutline/ai", () => ({
  detectDuplicateGroups: detectDuplicateGroupsMock,
  identifyAccentWordsBatch: identifyAccentWordsBatchMock,
  transcribeAudio: transcribeAudioMock,
}));

import { formatSmartCutResult, smartCutProject } from "./smart-cut-project";

const config = createTestConfig();

const videoRanges = async (projectDir: string) =>
  listVideoSegments(await loadProject(projectDir)).map((segment) => ({
    sourceStart: segment.sourceStart,
    sourceEnd: segment.sourceEnd,
    timelineStart: segment.timelineStart,
    timelineEnd: segment.timelineEnd,
  }));

describe("smartCutProject", () => {
  let root: string;
  let draftsDir: string;
  let talk: TalkProject;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    detectDuplicateGroupsMock.mockResolvedValue([]);
    root = await createTempDir();
    draftsDir = path.join(root, "drafts");
    talk = await prepareTalkProject(root, draftsDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it("saves a cut copy and leaves the original alone", async () => {
    const result = await smartCutProject(talk.projectDir, {
      config,
      outputRoot: talk.outputRoot,
    });

    expect(result.saved.path).toBe(path.join(draftsDir, "Morning take smart cut"));
    expect(result.saved.backupPath).toBeUndefined();
    expect(result.videosProcessed).toBe(1);
    expect(result.skippedMedia).toEqual([]);
    expect(result.subtitlesAdded).toBe(0);
    expect(result.stats).toEqual({
      originalDuration: "0:30",
      finalDuration: "0:04",
      timeSaved: "0:26",
      duplicatesRemoved: 0,
      silencesRemoved: 3,
    });

    expect(await videoRanges(result.saved.path)).toEqual([
      { sourceStart: 2, sourceEnd: 4, timelineStart: 0, timelineEnd: 2 },
      { sourceStart: 10, sourceEnd: 12, timelineStart: 2, timelineEnd: 4 },
    ]);
    expect(await videoRanges(talk.projectDir)).toEqual([
      { sourceStart: 0, sourceEnd: 30, timelineStart: 0, timelineEnd: 30 },
    ]);
    expect(transcribeAudioMock).not.toHaveBeenCalled();
    expect(detectDuplicateGroupsMock).toHaveBeenCalledTimes(1);
  });

  it("adds subtitles on the cut timeline", async () => {
    identifyAccentWordsBatchMock.mockResolvedValue([["Hello"]]);

    const result = await smartCutProject(talk.projectDir, {
      config,
      outputRoot: talk.outputRoot,
      addSubtitles: true,
      name: "Short version",
    });

    expect(result.saved.path).toBe(path.join(draftsDir, "Short version"));
    expect(result.subtitlesAdded).toBe(1);
    expect(identifyAccentWordsBatchMock).toHaveBeenCalledWith(
      ["Hello there. Hello again."],
      config.ai
    );

    const texts = listTextSegments(await loadProject(result.saved.path));
    expect(texts.map(({ text, timelineStart, timelineEnd }) => ({ text, timelineStart, timelineEnd }))).toEqual([
      { text: "Welcome back", timelineStart: 1, timelineEnd: 3 },
      { text: "Hello there. Hello again.", timelineStart: 0, timelineEnd: 4 },
    ]);
    expect(formatSmartCutResult(result)).toContain("  Subtitles added: 1\n");
  });

  it("rewrites the project in place after a backup", async () => {
    const result = await smartCutProject(talk.projectDir, {
      config,
      outputRoot: talk.outputRoot,
      inPlace: true,
    });

    expect(result.saved.path).toBe(talk.projectDir);
    expect(result.saved.backupPath).toMatch(/Morning take backup \d{8}-\d{6}$/);
    expect(await videoRanges(talk.projectDir)).toHaveLength(2);
    expect(await videoRanges(result.saved.backupPath ?? "")).toHaveLength(1);
    expect(formatSmartCutResult(result).split("\n").slice(-2)).toEqual([
      `Saved to ${talk.projectDir}`,
      `Backup at ${result.saved.backupPath}`,
    ]);
  });

  it("fails without writing when no source media can be read", async () => {
    const otherDrafts = path.join(root, "other");
    const projectDir = await copyFixtureProject(otherDrafts);

    await expect(
      smartCutProject(projectDir, { config, outputRoot: talk.outputRoot })
    ).rejects.toMatchObject({ code: "APPLY_ERROR", details: { actual: ["/media/take.mov"] } });
    expect(await fs.readdir(otherDrafts)).toEqual(["Morning take"]);
  });

  it("refuses to run when the editor's projects may not be modified", async () => {
    await expect(
      smartCutProject(talk.projectDir, {
        config,
        capabilities: createCapabilities("source"),
        outputRoot: talk.outputRoot,
      })
    ).rejects.toMatchObject({ code: "PERMISSION_ERROR" });
    expect(detectDuplicateGroupsMock).not.toHaveBeenCalled();
    expect(await fs.readdir(draftsDir)).toEqual(["Morning take"]);
  });
});
