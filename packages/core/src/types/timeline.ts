import type { DraftContent, DraftMeta } from "../timeline/schema";

export const CONTENT_FILE_NAMES = ["draft_info.json", "draft_content.json"] as const;
export const META_FILE_NAME = "draft_meta_info.json";

/** Newer host versions write `draft_info.json`, older ones `draft_content.json`. */
export type ContentFileName = (typeof CONTENT_FILE_NAMES)[number];

export interface Project {
  // Directory the project was loaded from
  path: string;
  contentFileName: ContentFileName;
  content: DraftContent;
  meta: DraftMeta;
}

export type MaterialKind = "video" | "audio" | "text" | "other";

/**
 * Read view over one entry of the content document's `materials` map.
 * Segments refer to materials by id only; resolve them with `findMaterial`.
 */
export interface Material {
  id: string;
  kind: MaterialKind;
  // Key under `materials` the entry lives in, e.g. "videos" or "speeds"
  category: string;
  path?: string;
  text?: string;
  durationUs?: number;
}

export interface ProjectMetadata {
  id: string;
  name: string;
  durationUs: number;
  createdAt?: number;
  modifiedAt?: number;
}

export type ViolationCode =
  | "duplicate-id"
  | "unresolved-material"
  | "non-integer-time"
  | "non-positive-duration"
  | "negative-start"
  | "unordered-segments"
  | "overlapping-segments"
  | "missing-source-range"
  | "source-out-of-range"
  | "duration-mismatch";

export interface Violation {
  code: ViolationCode;
  message: string;
  entityId?: string;
  expected?: unknown;
  actual?: unknown;
}

export interface SubtitleLine {
  // Seconds on the edited timeline
  start: number;
  end: number;
  text: string;
  accentWords?: string[];
  position?: "top" | "bottom";
}

export interface TextStyle {
  fontSize: number;
  fontColor: string;
  accentColor: string;
  backgroundColor: string | null;
  backgroundAlpha: number;
  // 0 is the top of the canvas, 1 the bottom
  positionY: number;
  // Alternate lines between the top third and positionY
  alternatePositions: boolean;
  bold: boolean;
  fontPath: string;
}

/** Where a slice of a source material sits on the edited timeline, in seconds. */
export interface TimelinePlacement {
  segmentId: string;
  sourceStart: number;
  sourceEnd: number;
  targetStart: number;
}

export interface VideoSegmentView {
  id: string;
  materialId: string;
  sourcePath: string;
  timelineStart: number;
  timelineEnd: number;
  sourceStart: number;
  sourceEnd: number;
  duration: number;
}

export interface TextSegmentView {
  id: string;
  materialId: string;
  text: string;
  timelineStart: number;
  timelineEnd: number;
}
