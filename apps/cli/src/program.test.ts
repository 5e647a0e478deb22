import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { copyFixtureProject, createTempDir, removeTempDir } from "@cutline/core/testing";
import { writeJSON } from "@cutline/core";
import { createTalkTranscript } from "./__fixtures__/transcript";

vi.mock("@cutline/ai", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@cutline/ai")>()),
  detectDuplicateGroups: vi.fn(),
  identifyAccentWordsBatch: vi.fn(),
  transcribeAudio: vi.fn(),
}));

import { loadConfig } from "./config";
import { formatHelp, runCli } from "./program";
import { getOutputPaths } from "./tools/transcribe";

const commandNames = (help: string) =>
  help
    .split("\n")
    .filter((line) => line.startsWith("  "))
    .map((line) => line.trim().split(/\s+/)[0]);

describe("formatHelp", () => {
  it("lists every command when projects may be modified", () => {
    expect(commandNames(formatHelp(loadConfig({})))).toEqual([
      "projects",
      "open",
      "transcribe",
      "analyze",
      "subtitles",
      "smart-cut",
      "add-subtitles",
    ]);
  });

  it("hides commands the capability gate forbids", () => {
    expect(commandNames(formatHelp(loadConfig({ CUTLINE_ALLOWED_TARGETS: "source" })))).toEqual([
      "projects",
      "open",
      "transcribe",
      "analyze",
      "subtitles",
    ]);
  });
});

describe("runCli", () => {
  let root: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    root = await createTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it("prints help by default", async () => {
    await expect(runCli([], {})).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(formatHelp(loadConfig({})));
  });

  it("denies a mutating command the gate forbids", async () => {
    await expect(
      runCli(["smart-cut", root], { CUTLINE_ALLOWED_TARGETS: "source" })
    ).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error [PERMISSION_ERROR]: smart-cut needs permission to modify capcut files, but allowed targets are "source" (requires capcut or all)'
    );
  });

  it("reports configuration errors", async () => {
    await expect(runCli(["projects"], { CUTLINE_ALLOWED_TARGETS: "nothing" })).resolves.toBe(1);
    expect(vi.mocked(console.error).mock.calls[0]?.[0]).toMatch(
      /^Error: Invalid configuration: CUTLINE_ALLOWED_TARGETS: /
    );
  });

  it("rejects unknown commands and missing arguments", async () => {
    await expect(runCli(["frobnicate"], {})).resolves.toBe(1);
    await expect(runCli(["open"], {})).resolves.toBe(1);
    expect(vi.mocked(console.error).mock.calls.map((call) => call[0])).toEqual([
      'Error: Unknown command "frobnicate". Run "cutline help" for the list of commands.',
      "Error: Missing argument. Usage: cutline open <project folder or name>",
    ]);
  });

  it("lists projects in the configured drafts folder", async () => {
    const projectDir = await copyFixtureProject(root);

    await expect(runCli(["projects"], { CUTLINE_DRAFTS_DIR: root })).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(
      `Projects in ${root}:\nMorning take  [0:30, 1 video]\n  ${projectDir}`
    );
  });

  it("writes a cut plan for a transcript file", async () => {
    const transcriptPath = path.join(root, "talk.json");
    const outDir = path.join(root, "out");
    await writeJSON(transcriptPath, createTalkTranscript());

    await expect(
      runCli(["analyze", transcriptPath, "--no-duplicates", "--out-dir", outDir], {})
    ).resolves.toBe(0);

    const plan: unknown = JSON.parse(
      await fs.readFile(getOutputPaths(transcriptPath, outDir).cutPlanFile, "utf8")
    );
    expect(plan).toMatchObject({
      sourceDuration: 30,
      stats: { keptDuration: 4, keptCount: 2 },
    });
  });
});
