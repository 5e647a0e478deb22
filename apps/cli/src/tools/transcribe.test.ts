import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTempDir, removeTempDir } from "@cutline/core/testing";
import { createTalkTranscript } from "../__fixtures__/transcript";

const { transcribeAudioMock } = vi.hoisted(() => ({ transcribeAudioMock: vi.fn() }));

vi.mock("@cutline/ai", () => ({
  transcribeAudio: transcribeAudioMock,
}));

import { getOutputPaths, transcribe } from "./transcribe";

describe("getOutputPaths", () => {
  it("caches results in a folder named after the input file and its location", () => {
    expect(getOutputPaths("/media/take.mov", "/cache")).toEqual({
      outputDir: "/cache/take-844a2434",
      transcriptFile: "/cache/take-844a2434/transcript.json",
      cutPlanFile: "/cache/take-844a2434/cut-plan.json",
      srtFile: "/cache/take-844a2434/take.srt",
    });
  });

  it("keeps same-named files in different folders apart", () => {
    expect(getOutputPaths("/archive/take.mov", "/cache").outputDir).toBe("/cache/take-a2ddc162");
  });

  it("keys relative paths by their absolute location", () => {
    const relative = path.relative(process.cwd(), "/media/take.mov");
    expect(getOutputPaths(relative, "/cache").outputDir).toBe("/cache/take-844a2434");
  });

  it("defaults to ./output", () => {
    expect(path.dirname(getOutputPaths("clip.wav").outputDir)).toBe("output");
  });
});

describe("transcribe tool", () => {
  let dir: string;
  let transcriptFile: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    dir = await createTempDir();
    transcriptFile = path.join(dir, "take", "transcript.json");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it("returns the cached transcript when not forced", async () => {
    await fs.mkdir(path.dirname(transcriptFile), { recursive: true });
    await fs.writeFile(transcriptFile, JSON.stringify(createTalkTranscript()));

    const result = await transcribe("/media/take.mov", transcriptFile);

    expect(result).toEqual(createTalkTranscript());
    expect(transcribeAudioMock).not.toHaveBeenCalled();
  });

  it("transcribes and writes the cache when none exists", async () => {
    transcribeAudioMock.mockResolvedValue(createTalkTranscript());

    const result = await transcribe("/media/take.mov", transcriptFile, { language: "en" });

    expect(result).toEqual(createTalkTranscript());
    expect(transcribeAudioMock).toHaveBeenCalledWith("/media/take.mov", {
      language: "en",
      config: undefined,
    });
    expect(JSON.parse(await fs.readFile(transcriptFile, "utf8"))).toEqual(createTalkTranscript());
  });

  it("ignores the cache when forced", async () => {
    await fs.mkdir(path.dirname(transcriptFile), { recursive: true });
    await fs.writeFile(transcriptFile, JSON.stringify({ duration: 1, segments: [] }));
    transcribeAudioMock.mockResolvedValue(createTalkTranscript());

    const result = await transcribe("/media/take.mov", transcriptFile, { force: true });

    expect(result.segments).toHaveLength(2);
    expect(transcribeAudioMock).toHaveBeenCalledTimes(1);
  });

  it("rejects a corrupt cache", async () => {
    await fs.mkdir(path.dirname(transcriptFile), { recursive: true });
    await fs.writeFile(transcriptFile, JSON.stringify({ segments: "nope" }));

    await expect(transcribe("/media/take.mov", transcriptFile)).rejects.toMatchObject({
      code: "PLANNING_ERROR",
    });
  });
});
