import cloneDeep from "lodash/cloneDeep";
import { getCoveredDuration, getKeptSegments, validateCutPlan } from "../cut-plan/cut-plan";
import { ApplyError } from "../errors";
import type { CutPlan } from "../types/cut-plan";
import type { Project, TimelinePlacement } from "../types/timeline";
import { generateId } from "../utils/ids";
import { microsecondsToSeconds, secondsToMicroseconds } from "../utils/time";
import { findMaterial, recomputeDuration } from "./project";
import type { DraftSegment } from "./schema";

// Transcribed duration and container duration rarely agree to the microsecond
export const DEFAULT_COVERAGE_TOLERANCE_US = 100_000;

const RETIMED_TRACK_TYPES = new Set(["video", "audio"]);

export interface ApplyCutPlanOptions {
  coverageToleranceUs?: number;
}

interface RangeUs {
  start: number;
  end: number;
}

const byTargetStart = (a: DraftSegment, b: DraftSegment) =>
  a.target_timerange.start - b.target_timerange.start;

/**
 * Rebuilds one track: every intersection between a segment's source range
 * and a kept range becomes one output segment, laid end to end from the
 * track's leading offset. Segments of other materials keep their source
 * range and move up to the cursor.
 */
const recutTrack = (
  segments: DraftSegment[],
  materialId: string,
  kept: RangeUs[]
): DraftSegment[] => {
  const ordered = [...segments].sort(byTargetStart);
  let cursor = ordered[0]?.target_timerange.start ?? 0;
  const output: DraftSegment[] = [];

  for (const segment of ordered) {
    const source = segment.source_timerange;
    if (segment.material_id !== materialId || !source) {
      output.push({
        ...segment,
        target_timerange: { ...segment.target_timerange, start: cursor },
      });
      cursor += segment.target_timerange.duration;
      continue;
    }

    const sourceStart = source.start;
    const sourceEnd = source.start + source.duration;
    let pieces = 0;

    for (const range of kept) {
      const start = Math.max(sourceStart, range.start);
      const end = Math.min(sourceEnd, range.end);
      if (end <= start) {
        continue;
      }

      const piece = cloneDeep(segment);
      piece.id = pieces === 0 ? segment.id : generateId();
      piece.source_timerange = { ...source, start, duration: end - start };
      piece.target_timerange = {
        ...segment.target_timerange,
        start: cursor,
        duration: end - start,
      };
      output.push(piece);
      cursor += end - start;
      pieces += 1;
    }
  }

  return output;
};

/**
 * Rewrites every video/audio track that uses `sourceMaterialId` so it plays
 * only the kept parts of the plan, back to back. Returns a new project; the
 * input is not modified. Text tracks are not re-timed, and materials are left
 * in place even when no segment references them any more.
 */
export const applyCutPlan = (
  project: Project,
  plan: CutPlan,
  sourceMaterialId: string,
  options: ApplyCutPlanOptions = {}
): Project => {
  const tolerance = options.coverageToleranceUs ?? DEFAULT_COVERAGE_TOLERANCE_US;
  const material = findMaterial(project, sourceMaterialId);

  if (!material) {
    throw new ApplyError(`Material ${sourceMaterialId} does not exist in the project`, {
      entityId: sourceMaterialId,
    });
  }
  if (material.durationUs === undefined) {
    throw new ApplyError(`Material ${sourceMaterialId} has no duration to cut against`, {
      entityId: sourceMaterialId,
      expected: "a media material with a duration",
      actual: material.kind,
    });
  }

  const problems = validateCutPlan(plan);
  if (problems.length) {
    throw new ApplyError(`Cut plan is not a gap-free partition: ${problems.join("; ")}`, {
      entityId: sourceMaterialId,
      actual: problems,
    });
  }

  const coveredUs = secondsToMicroseconds(getCoveredDuration(plan));
  if (Math.abs(coveredUs - material.durationUs) > tolerance) {
    throw new ApplyError(
      `Cut plan covers ${coveredUs}µs but material ${sourceMaterialId} lasts ${material.durationUs}µs`,
      {
        entityId: sourceMaterialId,
        expected: material.durationUs,
        actual: coveredUs,
        toleranceUs: tolerance,
      }
    );
  }

  const kept = getKeptSegments(plan).map((segment) => ({
    start: secondsToMicroseconds(segment.sourceStart),
    end: secondsToMicroseconds(segment.sourceEnd),
  }));

  const next = cloneDeep(project);
  for (const track of next.content.tracks) {
    if (!RETIMED_TRACK_TYPES.has(track.type)) {
      continue;
    }
    if (!track.segments.some((segment) => segment.material_id === sourceMaterialId)) {
      continue;
    }
    track.segments = recutTrack(track.segments, sourceMaterialId, kept);
  }
  recomputeDuration(next);

  return next;
};

/**
 * Where each slice of a material plays on the timeline, read from the first
 * video track using it (or the first audio track when no video track does).
 * Use this as the coordinate basis when regenerating subtitles after a cut.
 */
export const getTimelinePlacements = (
  project: Project,
  materialId: string
): TimelinePlacement[] => {
  const uses = (type: string) =>
    project.content.tracks.find(
      (track) =>
        track.type === type &&
        track.segments.some((segment) => segment.material_id === materialId)
    );
  const track = uses("video") ?? uses("audio");
  if (!track) {
    return [];
  }

  return track.segments
    .filter((segment) => segment.material_id === materialId)
    .sort(byTargetStart)
    .flatMap((segment) => {
      const source = segment.source_timerange;
      if (!source) {
        return [];
      }
      return [
        {
          segmentId: segment.id,
          sourceStart: microsecondsToSeconds(source.start),
          sourceEnd: microsecondsToSeconds(source.start + source.duration),
          targetStart: microsecondsToSeconds(segment.target_timerange.start),
        },
      ];
    });
};
