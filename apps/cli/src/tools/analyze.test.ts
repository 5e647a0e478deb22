import { beforeEach, describe, expect, it, vi } from "vitest";
import { createTalkTranscript } from "../__fixtures__/transcript";

const { detectDuplicateGroupsMock } = vi.hoisted(() => ({
  detectDuplicateGroupsMock: vi.fn(),
}));

vi.mock("@cutline/ai", () => ({
  detectDuplicateGroups: detectDuplicateGroupsMock,
}));

import { analyze, formatAnalysisSummary } from "./analyze";

const options = { silenceThresholdSec: 3, minSegmentDurationSec: 0.5 };

describe("analyze", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("removes pauses without asking for duplicates when disabled", async () => {
    const result = await analyze(createTalkTranscript(), { ...options, detectDuplicates: false });

    expect(detectDuplicateGroupsMock).not.toHaveBeenCalled();
    expect(result.paragraphs.map((paragraph) => paragraph.text)).toEqual([
      "Hello there.",
      "Hello again.",
    ]);
    expect(result.plan.segments.map((segment) => segment.reason)).toEqual([
      "pause",
      "kept",
      "pause",
      "kept",
      "pause",
    ]);
    expect(result.summary).toEqual({
      originalDuration: "0:30",
      finalDuration: "0:04",
      timeSaved: "0:26",
      duplicatesRemoved: 0,
      silencesRemoved: 3,
      keptSegments: 2,
    });
  });

  it("drops all but the last take of a duplicate group", async () => {
    detectDuplicateGroupsMock.mockResolvedValue([{ paragraphIndices: [0, 1], reason: "retake" }]);

    const result = await analyze(createTalkTranscript(), { ...options, detectDuplicates: true });

    expect(detectDuplicateGroupsMock).toHaveBeenCalledWith(result.paragraphs, undefined);
    expect(result.duplicateGroups).toEqual([{ paragraphIndices: [0, 1], reason: "retake" }]);
    expect(result.plan.segments.map((segment) => segment.reason)).toEqual([
      "pause",
      "duplicate",
      "pause",
      "kept",
      "pause",
    ]);
    expect(result.summary).toMatchObject({
      finalDuration: "0:02",
      duplicatesRemoved: 1,
      keptSegments: 1,
    });
  });
});

describe("formatAnalysisSummary", () => {
  it("prints one statistic per line", () => {
    expect(
      formatAnalysisSummary({
        originalDuration: "1:00",
        finalDuration: "0:45",
        timeSaved: "0:15",
        duplicatesRemoved: 2,
        silencesRemoved: 4,
        keptSegments: 3,
      })
    ).toBe(
      [
        "Original duration: 1:00",
        "Final duration: 0:45",
        "Time saved: 0:15",
        "Duplicates removed: 2",
        "Silences removed: 4",
      ].join("\n")
    );
  });
});
