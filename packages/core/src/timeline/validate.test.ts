import { beforeEach, describe, expect, it } from "vitest";
import { readFixtureDocument } from "../__fixtures__/project";
import type { Project } from "../types/timeline";
import { parseProject } from "./project";
import type { DraftSegment } from "./schema";
import { validateProject } from "./validate";

const findSegment = (project: Project, id: string): DraftSegment => {
  for (const track of project.content.tracks) {
    const segment = track.segments.find((candidate) => candidate.id === id);
    if (segment) {
      return segment;
    }
  }
  throw new Error(`no segment ${id}`);
};

const codes = (project: Project) => validateProject(project).map((violation) => violation.code);

describe("validateProject", () => {
  let project: Project;

  beforeEach(async () => {
    project = parseProject(
      "/drafts/Morning take",
      "draft_info.json",
      await readFixtureDocument("draft_info.json"),
      await readFixtureDocument("draft_meta_info.json")
    );
  });

  it("accepts a well-formed project", () => {
    expect(validateProject(project)).toEqual([]);
  });

  it("reports overlapping segments and a short project duration", () => {
    const track = project.content.tracks[0];
    track?.segments.push({
      id: "SEG-2",
      material_id: "VIDEO-1",
      source_timerange: { start: 0, duration: 1_000_000 },
      target_timerange: { start: 29_500_000, duration: 1_000_000 },
    });

    expect(validateProject(project)).toEqual([
      {
        code: "overlapping-segments",
        message: "Segment SEG-2 overlaps SEG-1 on track TRACK-V",
        entityId: "SEG-2",
        expected: ">= 30000000",
        actual: 29_500_000,
      },
      {
        code: "duration-mismatch",
        message: "Project duration ends before its last segment",
        expected: ">= 30500000",
        actual: 30_000_000,
      },
    ]);
  });

  it("reports segments listed out of order", () => {
    project.content.tracks[2]?.segments.push({
      id: "SEG-T0",
      material_id: "TEXT-1",
      source_timerange: null,
      target_timerange: { start: 0, duration: 500_000 },
    });

    expect(codes(project)).toEqual(["unordered-segments"]);
  });

  it("reports times that are not integer microseconds", () => {
    findSegment(project, "SEG-T").target_timerange.duration = 1.5;

    expect(codes(project)).toEqual(["non-integer-time"]);
  });

  it("reports material durations that are not integer microseconds", () => {
    const audio = project.content.materials.audios?.[0];
    if (audio) {
      audio.duration = 60_000_000.5;
    }

    expect(validateProject(project)).toEqual([
      {
        code: "non-integer-time",
        message: "Duration of material AUDIO-1 is not in integer microseconds",
        entityId: "AUDIO-1",
        expected: "integer microseconds",
        actual: 60_000_000.5,
      },
    ]);
  });

  it("reports empty and negative ranges", () => {
    findSegment(project, "SEG-T").target_timerange = { start: -1, duration: 0 };

    expect(codes(project)).toEqual(["negative-start", "non-positive-duration"]);
  });

  it("reports unresolved materials without throwing", () => {
    findSegment(project, "SEG-T").material_id = "GHOST";

    expect(validateProject(project)).toEqual([
      {
        code: "unresolved-material",
        message: "Segment SEG-T references missing material GHOST",
        entityId: "SEG-T",
        actual: "GHOST",
      },
    ]);
  });

  it("reports source ranges past the material end", () => {
    findSegment(project, "SEG-1").source_timerange = { start: 0, duration: 31_000_000 };

    expect(codes(project)).toEqual(["source-out-of-range"]);
  });

  it("requires a source range on media tracks", () => {
    findSegment(project, "SEG-1").source_timerange = null;

    expect(codes(project)).toEqual(["missing-source-range"]);
  });

  it("reports reused ids", () => {
    findSegment(project, "SEG-A").id = "SEG-1";

    expect(validateProject(project)[0]).toMatchObject({
      code: "duplicate-id",
      entityId: "SEG-1",
    });
  });
});
