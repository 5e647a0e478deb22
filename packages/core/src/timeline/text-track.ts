import cloneDeep from "lodash/cloneDeep";
import type { Project, SubtitleLine, TextStyle } from "../types/timeline";
import { generateId } from "../utils/ids";
import { secondsToMicroseconds } from "../utils/time";
import { recomputeDuration } from "./project";
import type { DraftMaterial, DraftSegment, DraftTrack } from "./schema";

export const DEFAULT_TEXT_STYLE: TextStyle = {
  fontSize: 8,
  fontColor: "#FFFFFF",
  accentColor: "#FFD400",
  backgroundColor: null,
  backgroundAlpha: 0,
  positionY: 0.8,
  alternatePositions: false,
  bold: false,
  fontPath: "",
};

const TOP_POSITION_Y = 0.2;
// Subtitles render above the video tracks
const TEXT_RENDER_INDEX = 11000;

export const hexToRgb = (hex: string): [number, number, number] => {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex.trim());
  if (!match) {
    return [1, 1, 1];
  }
  const channel = (value: string | undefined) =>
    Math.round((parseInt(value ?? "ff", 16) / 255) * 1000) / 1000;
  return [channel(match[1]), channel(match[2]), channel(match[3])];
};

interface TextRun {
  start: number;
  end: number;
  accent: boolean;
}

/**
 * Splits text into consecutive runs, marking the first occurrence of each
 * accent word. Overlapping matches keep the earlier one.
 */
export const buildTextRuns = (text: string, accentWords: string[] = []): TextRun[] => {
  const matches: Array<{ start: number; end: number }> = [];
  for (const word of accentWords) {
    const needle = word.trim();
    if (!needle) {
      continue;
    }
    const start = text.indexOf(needle);
    if (start === -1) {
      continue;
    }
    const end = start + needle.length;
    if (matches.some((match) => start < match.end && end > match.start)) {
      continue;
    }
    matches.push({ start, end });
  }
  matches.sort((a, b) => a.start - b.start);

  const runs: TextRun[] = [];
  let cursor = 0;
  for (const match of matches) {
    if (match.start > cursor) {
      runs.push({ start: cursor, end: match.start, accent: false });
    }
    runs.push({ start: match.start, end: match.end, accent: true });
    cursor = match.end;
  }
  if (cursor < text.length || runs.length === 0) {
    runs.push({ start: cursor, end: text.length, accent: false });
  }
  return runs;
};

const buildRichText = (text: string, style: TextStyle, accentWords?: string[]) =>
  JSON.stringify({
    styles: buildTextRuns(text, accentWords).map((run) => ({
      fill: {
        alpha: 1.0,
        content: {
          render_type: "solid",
          solid: { color: hexToRgb(run.accent ? style.accentColor : style.fontColor) },
        },
      },
      font: { id: "", path: style.fontPath },
      range: [run.start, run.end],
      size: style.fontSize,
      ...(style.bold ? { bold: true } : {}),
    })),
    text,
  });

const buildTextMaterial = (
  id: string,
  line: SubtitleLine,
  style: TextStyle
): DraftMaterial => ({
  id,
  type: "text",
  add_type: 0,
  alignment: 1,
  background_alpha: style.backgroundAlpha,
  background_color: style.backgroundColor ?? "",
  background_style: style.backgroundColor ? 1 : 0,
  bold_width: style.bold ? 1.0 : 0.0,
  content: buildRichText(line.text, style, line.accentWords),
  font_path: style.fontPath,
  font_size: style.fontSize,
  global_alpha: 1.0,
  line_max_width: 0.82,
  line_spacing: 0.02,
  text_color: style.fontColor,
  text_size: style.fontSize,
});

const buildTextSegment = (
  materialId: string,
  startUs: number,
  durationUs: number,
  positionY: number
): DraftSegment => ({
  id: generateId(),
  material_id: materialId,
  target_timerange: { start: startUs, duration: durationUs },
  source_timerange: { start: 0, duration: durationUs },
  clip: {
    alpha: 1.0,
    flip: { horizontal: false, vertical: false },
    rotation: 0.0,
    scale: { x: 1.0, y: 1.0 },
    // Clip transforms are relative to the canvas centre
    transform: { x: 0.0, y: positionY - 0.5 },
  },
  render_index: TEXT_RENDER_INDEX,
  visible: true,
  speed: 1.0,
});

const resolvePositionY = (
  line: SubtitleLine,
  index: number,
  style: TextStyle
): number => {
  if (line.position === "top") {
    return TOP_POSITION_Y;
  }
  if (line.position === "bottom") {
    return style.positionY;
  }
  if (style.alternatePositions && index % 2 === 1) {
    return TOP_POSITION_Y;
  }
  return style.positionY;
};

/**
 * Appends a new text track with one text material and segment per subtitle
 * line. Line times are already in the edited timeline's coordinates and are
 * placed verbatim. Lines with no duration are skipped.
 */
export const addTextTrack = (
  project: Project,
  lines: SubtitleLine[],
  style: Partial<TextStyle> = {}
): Project => {
  const next = cloneDeep(project);
  const resolvedStyle: TextStyle = { ...DEFAULT_TEXT_STYLE, ...style };

  const placeable = lines.filter((line) => line.end > line.start);
  if (!placeable.length) {
    return next;
  }

  const textMaterials = next.content.materials.texts ?? [];
  next.content.materials.texts = textMaterials;

  const segments = placeable.map((line, index) => {
    const materialId = generateId();
    textMaterials.push(buildTextMaterial(materialId, line, resolvedStyle));

    const startUs = secondsToMicroseconds(line.start);
    const durationUs = secondsToMicroseconds(line.end) - startUs;
    return buildTextSegment(
      materialId,
      startUs,
      durationUs,
      resolvePositionY(line, index, resolvedStyle)
    );
  });

  const track: DraftTrack = {
    attribute: 0,
    flag: 0,
    id: generateId(),
    is_default_name: true,
    name: "",
    segments,
    type: "text",
  };
  next.content.tracks.push(track);
  recomputeDuration(next);

  return next;
};
