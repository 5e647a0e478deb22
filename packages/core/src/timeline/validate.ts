import type { Material, Project, Violation } from "../types/timeline";
import { listMaterials } from "./project";
import type { TimeRange } from "./schema";

const MEDIA_TRACK_TYPES = new Set(["video", "audio"]);

const checkRange = (
  range: TimeRange,
  label: string,
  entityId: string,
  violations: Violation[]
): void => {
  if (!Number.isInteger(range.start) || !Number.isInteger(range.duration)) {
    violations.push({
      code: "non-integer-time",
      message: `${label} of ${entityId} is not in integer microseconds`,
      entityId,
      expected: "integer microseconds",
      actual: { start: range.start, duration: range.duration },
    });
  }
  if (range.start < 0) {
    violations.push({
      code: "negative-start",
      message: `${label} of ${entityId} starts before zero`,
      entityId,
      expected: ">= 0",
      actual: range.start,
    });
  }
  if (range.duration <= 0) {
    violations.push({
      code: "non-positive-duration",
      message: `${label} of ${entityId} has no duration`,
      entityId,
      expected: "> 0",
      actual: range.duration,
    });
  }
};

/**
 * Checks a project's structural invariants and returns every violation found.
 * Never throws; callers decide which violations are fatal.
 */
export const validateProject = (project: Project): Violation[] => {
  const violations: Violation[] = [];
  const materials = new Map<string, Material>();

  for (const material of listMaterials(project)) {
    if (materials.has(material.id)) {
      violations.push({
        code: "duplicate-id",
        message: `Material id ${material.id} is used more than once`,
        entityId: material.id,
      });
      continue;
    }
    materials.set(material.id, material);
    if (material.durationUs !== undefined && !Number.isInteger(material.durationUs)) {
      violations.push({
        code: "non-integer-time",
        message: `Duration of material ${material.id} is not in integer microseconds`,
        entityId: material.id,
        expected: "integer microseconds",
        actual: material.durationUs,
      });
    }
  }

  const timelineIds = new Set<string>();
  const claimId = (id: string, kind: string) => {
    if (timelineIds.has(id)) {
      violations.push({
        code: "duplicate-id",
        message: `${kind} id ${id} is used more than once`,
        entityId: id,
      });
    }
    timelineIds.add(id);
  };

  let maxEnd = 0;

  for (const track of project.content.tracks) {
    claimId(track.id, "Track");
    let previous: TimeRange | null = null;
    let previousId = "";

    for (const segment of track.segments) {
      claimId(segment.id, "Segment");
      const target = segment.target_timerange;
      checkRange(target, "target_timerange", segment.id, violations);
      maxEnd = Math.max(maxEnd, target.start + target.duration);

      if (previous) {
        const previousEnd = previous.start + previous.duration;
        if (target.start < previous.start) {
          violations.push({
            code: "unordered-segments",
            message: `Segment ${segment.id} starts before ${previousId} on track ${track.id}`,
            entityId: segment.id,
            expected: `>= ${previous.start}`,
            actual: target.start,
          });
        } else if (target.start < previousEnd) {
          violations.push({
            code: "overlapping-segments",
            message: `Segment ${segment.id} overlaps ${previousId} on track ${track.id}`,
            entityId: segment.id,
            expected: `>= ${previousEnd}`,
            actual: target.start,
          });
        }
      }
      previous = target;
      previousId = segment.id;

      const material = materials.get(segment.material_id);
      if (!material) {
        violations.push({
          code: "unresolved-material",
          message: `Segment ${segment.id} references missing material ${segment.material_id}`,
          entityId: segment.id,
          actual: segment.material_id,
        });
      }

      const source = segment.source_timerange;
      if (!source) {
        if (MEDIA_TRACK_TYPES.has(track.type)) {
          violations.push({
            code: "missing-source-range",
            message: `Segment ${segment.id} on ${track.type} track ${track.id} has no source_timerange`,
            entityId: segment.id,
          });
        }
        continue;
      }

      checkRange(source, "source_timerange", segment.id, violations);
      if (
        material?.durationUs !== undefined &&
        source.start + source.duration > material.durationUs
      ) {
        violations.push({
          code: "source-out-of-range",
          message: `Segment ${segment.id} reads past the end of material ${material.id}`,
          entityId: segment.id,
          expected: `<= ${material.durationUs}`,
          actual: source.start + source.duration,
        });
      }
    }
  }

  const duration = project.content.duration;
  if (duration !== undefined) {
    if (!Number.isInteger(duration)) {
      violations.push({
        code: "non-integer-time",
        message: "Project duration is not in integer microseconds",
        actual: duration,
      });
    }
    if (duration < maxEnd) {
      violations.push({
        code: "duration-mismatch",
        message: "Project duration ends before its last segment",
        expected: `>= ${maxEnd}`,
        actual: duration,
      });
    }
  }

  return violations;
};
