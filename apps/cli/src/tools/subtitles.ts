import fs from "node:fs/promises";
import path from "node:path";
import { identifyAccentWordsBatch } from "@cutline/ai";
import type { AIConfig } from "@cutline/ai";
import {
  getAllWords,
  getKeptSegments,
  type CutPlan,
  type SubtitleLine,
  type TimelinePlacement,
  type Transcript,
  type Word,
} from "@cutline/core";

export interface LineLimits {
  maxWords: number;
  maxChars: number;
}

/**
 * Placements for a plan rendered on its own: kept ranges back to back from
 * zero.
 */
export const placementsFromPlan = (plan: CutPlan): TimelinePlacement[] => {
  let targetStart = 0;
  return getKeptSegments(plan).map((segment, index) => {
    const placement = {
      segmentId: `kept-${index}`,
      sourceStart: segment.sourceStart,
      sourceEnd: segment.sourceEnd,
      targetStart,
    };
    targetStart += segment.sourceEnd - segment.sourceStart;
    return placement;
  });
};

/**
 * Moves source-time words onto the edited timeline. A word belongs to the
 * placement its start falls in; words starting in removed ranges are dropped
 * and ends are clamped to the placement.
 */
export const mapWordsToTimeline = (
  words: Word[],
  placements: TimelinePlacement[]
): Word[] => {
  const mapped: Word[] = [];
  for (const placement of placements) {
    for (const word of words) {
      if (word.start < placement.sourceStart || word.start >= placement.sourceEnd) {
        continue;
      }
      mapped.push({
        ...word,
        start: placement.targetStart + word.start - placement.sourceStart,
        end:
          placement.targetStart +
          Math.min(word.end, placement.sourceEnd) -
          placement.sourceStart,
      });
    }
  }
  return mapped.sort((a, b) => a.start - b.start);
};

export const groupWordsIntoLines = (
  words: Word[],
  { maxWords, maxChars }: LineLimits
): SubtitleLine[] => {
  const lines: SubtitleLine[] = [];
  let current: Word[] = [];
  let text = "";

  const flush = () => {
    const first = current[0];
    const last = current[current.length - 1];
    if (first && last) {
      lines.push({ start: first.start, end: last.end, text });
    }
    current = [];
    text = "";
  };

  for (const word of words) {
    const wordText = word.text.trim();
    if (!wordText) {
      continue;
    }
    const candidate = `${text} ${wordText}`.trim();
    if (current.length && (current.length >= maxWords || candidate.length > maxChars)) {
      flush();
    }
    current.push(word);
    text = `${text} ${wordText}`.trim();
  }
  flush();

  return lines;
};

/** `HH:MM:SS,mmm`, rounded to the millisecond. */
export const formatSrtTimestamp = (seconds: number): string => {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const pad = (value: number, length = 2) => value.toString().padStart(length, "0");
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const secs = Math.floor((totalMs % 60_000) / 1000);
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(totalMs % 1000, 3)}`;
};

export const generateSrtContent = (lines: SubtitleLine[]): string =>
  lines
    .map(
      (line, index) =>
        `${index + 1}\n${formatSrtTimestamp(line.start)} --> ${formatSrtTimestamp(line.end)}\n${line.text}\n`
    )
    .join("\n");

/** Seconds for `HH:MM:SS,mmm` (a `.` separator is accepted); null when malformed. */
export const parseSrtTimestamp = (timestamp: string): number | null => {
  const match = /^(\d+):(\d{1,2}):(\d{1,2})(?:[,.](\d{1,3}))?$/.exec(timestamp.trim());
  if (!match) {
    return null;
  }
  const [, hours = "0", minutes = "0", secs = "0", millis = "0"] = match;
  return (
    Number(hours) * 3600 +
    Number(minutes) * 60 +
    Number(secs) +
    Number(millis.padEnd(3, "0")) / 1000
  );
};

/**
 * Reads SRT cues. Multi-line cue text is joined with spaces; cues without a
 * valid timing line are skipped.
 */
export const parseSrt = (content: string): SubtitleLine[] => {
  const lines: SubtitleLine[] = [];
  const blocks = content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n").trim().split(/\n\s*\n/);

  for (const block of blocks) {
    const rows = block.split("\n").map((row) => row.trim());
    const timingIndex = rows.findIndex((row) => row.includes("-->"));
    if (timingIndex === -1) {
      continue;
    }
    const [startText = "", endText = ""] = (rows[timingIndex] ?? "").split("-->");
    const start = parseSrtTimestamp(startText);
    const end = parseSrtTimestamp(endText);
    const text = rows.slice(timingIndex + 1).filter(Boolean).join(" ");
    if (start === null || end === null || !text) {
      continue;
    }
    lines.push({ start, end, text });
  }

  return lines;
};

export interface GenerateSubtitlesOptions extends LineLimits {
  accents: boolean;
  config?: AIConfig;
}

/**
 * Subtitle lines on the edited timeline for one transcribed source.
 */
export const generateSubtitles = async (
  transcript: Transcript,
  placements: TimelinePlacement[],
  options: GenerateSubtitlesOptions
): Promise<SubtitleLine[]> => {
  const words = mapWordsToTimeline(getAllWords(transcript), placements);
  const lines = groupWordsIntoLines(words, options);

  if (!options.accents || !lines.length) {
    return lines;
  }

  const accents = await identifyAccentWordsBatch(
    lines.map((line) => line.text),
    options.config
  );
  return lines.map((line, index) => {
    const accentWords = accents[index] ?? [];
    return accentWords.length ? { ...line, accentWords } : line;
  });
};

export const writeSrt = async (filePath: string, lines: SubtitleLine[]): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, generateSrtContent(lines), "utf8");
};

export const readSrt = async (filePath: string): Promise<SubtitleLine[]> =>
  parseSrt(await fs.readFile(filePath, "utf8"));
