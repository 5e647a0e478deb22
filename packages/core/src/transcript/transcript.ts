import { z } from "zod";
import { PlanningError } from "../errors";
import type {
  Paragraph,
  Transcript,
  TranscriptSegment,
  Word,
} from "../types/transcript";
import { isEndOfSentence, joinWordsText } from "../utils/words";

// Gaps are compared against thresholds after float subtraction
const EPSILON = 1e-9;

const wordSchema = z
  .object({
    id: z.string().optional(),
    text: z.string().optional(),
    // whisper-style output names the text field "word"
    word: z.string().optional(),
    start: z.number().nonnegative(),
    end: z.number().nonnegative(),
    confidence: z.number().optional(),
  })
  .refine((word) => word.text !== undefined || word.word !== undefined, {
    message: "word needs a text or word field",
  })
  .refine((word) => word.end >= word.start, {
    message: "word end must not precede its start",
  })
  .transform(
    (word): Word => ({
      ...(word.id !== undefined ? { id: word.id } : {}),
      text: word.text ?? word.word ?? "",
      start: word.start,
      end: word.end,
      ...(word.confidence !== undefined ? { confidence: word.confidence } : {}),
    })
  );

const segmentSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  start: z.number(),
  end: z.number(),
  text: z.string().default(""),
  words: z.array(wordSchema).default([]),
});

const transcriptSchema = z.object({
  filename: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().nonnegative(),
  segments: z.array(segmentSchema),
});

/**
 * Validates transcript JSON (our own cache files or whisper-style output).
 */
export const parseTranscript = (value: unknown): Transcript => {
  const result = transcriptSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new PlanningError(
      `Invalid transcript: ${issue?.path.join(".") || "<root>"}: ${issue?.message ?? "unknown issue"}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
};

export const segmentBounds = (
  segment: TranscriptSegment
): { start: number; end: number } => {
  const first = segment.words[0];
  const last = segment.words[segment.words.length - 1];
  if (!first || !last) {
    return { start: segment.start, end: segment.end };
  }
  return { start: first.start, end: last.end };
};

export const getAllWords = (transcript: Transcript): Word[] =>
  transcript.segments.flatMap((segment) => segment.words);

/**
 * The span a cut plan has to cover. Reported durations are occasionally
 * shorter than the last word's end, so the later of the two wins.
 */
export const getSourceDuration = (transcript: Transcript): number => {
  let end = transcript.duration;
  for (const segment of transcript.segments) {
    end = Math.max(end, segmentBounds(segment).end);
  }
  return end;
};

const segmentText = (segment: TranscriptSegment): string =>
  segment.words.length ? joinWordsText(segment.words) : segment.text.trim();

/**
 * Splits the transcript into paragraphs: a gap of at least
 * `silenceThresholdSec` between consecutive segments starts a new one.
 */
export const findParagraphs = (
  transcript: Transcript,
  silenceThresholdSec: number
): Paragraph[] => {
  const segments = [...transcript.segments].sort(
    (a, b) => segmentBounds(a).start - segmentBounds(b).start
  );

  const paragraphs: Paragraph[] = [];
  let current: TranscriptSegment[] = [];

  const flush = () => {
    const first = current[0];
    const last = current[current.length - 1];
    if (!first || !last) {
      return;
    }
    paragraphs.push({
      index: paragraphs.length,
      start: segmentBounds(first).start,
      end: Math.max(...current.map((segment) => segmentBounds(segment).end)),
      text: current.map(segmentText).filter(Boolean).join(" "),
      segmentIds: current.map((segment) => segment.id),
    });
    current = [];
  };

  let previousEnd: number | null = null;
  for (const segment of segments) {
    const { start, end } = segmentBounds(segment);
    if (
      previousEnd !== null &&
      start - previousEnd >= silenceThresholdSec - EPSILON
    ) {
      flush();
    }
    current.push(segment);
    previousEnd = previousEnd === null ? end : Math.max(previousEnd, end);
  }
  flush();

  return paragraphs;
};

// Word-level transcription output carries no punctuation, so a pause this
// long also ends a segment
export const DEFAULT_SEGMENT_GAP_SEC = 0.5;

export interface GroupWordsOptions {
  idPrefix?: string;
  maxGapSec?: number;
}

/**
 * Groups a flat word list into sentence-sized segments, for backends that
 * only return word timestamps. A segment ends at a sentence-final word or
 * before a gap of at least `maxGapSec`.
 */
export const groupWordsIntoSegments = (
  words: Word[],
  { idPrefix = "segment", maxGapSec = DEFAULT_SEGMENT_GAP_SEC }: GroupWordsOptions = {}
): TranscriptSegment[] => {
  const segments: TranscriptSegment[] = [];
  let currentWords: Word[] = [];

  const flushSegment = () => {
    const first = currentWords[0];
    const last = currentWords[currentWords.length - 1];
    if (!first || !last) {
      return;
    }
    segments.push({
      id: `${idPrefix}-${segments.length}`,
      start: first.start,
      end: last.end,
      text: joinWordsText(currentWords),
      words: currentWords,
    });
    currentWords = [];
  };

  for (const word of words) {
    const previous = currentWords[currentWords.length - 1];
    if (previous && word.start - previous.end >= maxGapSec - EPSILON) {
      flushSegment();
    }
    currentWords.push(word);
    if (isEndOfSentence(word.text)) {
      flushSegment();
    }
  }
  flushSegment();

  return segments;
};
