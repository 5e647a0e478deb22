import type { CutPlan, CutSegment } from "../types/cut-plan";

const EPSILON = 1e-9;

export const getKeptSegments = (plan: CutPlan): CutSegment[] =>
  plan.segments.filter((segment) => segment.kept);

export const getCoveredDuration = (plan: CutPlan): number => {
  const first = plan.segments[0];
  const last = plan.segments[plan.segments.length - 1];
  if (!first || !last) {
    return 0;
  }
  return last.sourceEnd - first.sourceStart;
};

/**
 * Checks that a plan is an ordered, gap-free partition of
 * [0, sourceDuration). Returns human-readable problems; empty means valid.
 */
export const validateCutPlan = (plan: CutPlan): string[] => {
  const problems: string[] = [];
  const first = plan.segments[0];
  const last = plan.segments[plan.segments.length - 1];

  if (!first || !last) {
    return ["plan has no segments"];
  }
  if (Math.abs(first.sourceStart) > EPSILON) {
    problems.push(`plan starts at ${first.sourceStart}s instead of 0s`);
  }
  if (Math.abs(last.sourceEnd - plan.sourceDuration) > EPSILON) {
    problems.push(
      `plan ends at ${last.sourceEnd}s but the source lasts ${plan.sourceDuration}s`
    );
  }

  plan.segments.forEach((segment, index) => {
    if (!(segment.sourceStart < segment.sourceEnd)) {
      problems.push(
        `segment ${index} is empty or reversed: [${segment.sourceStart}, ${segment.sourceEnd})`
      );
    }
    const next = plan.segments[index + 1];
    if (next && Math.abs(next.sourceStart - segment.sourceEnd) > EPSILON) {
      problems.push(
        `segment ${index} ends at ${segment.sourceEnd}s but segment ${index + 1} starts at ${next.sourceStart}s`
      );
    }
  });

  return problems;
};
