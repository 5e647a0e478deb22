export interface Word {
  id?: string;
  text: string;
  // Seconds from the start of the source recording
  start: number;
  end: number;
  confidence?: number;
}

export interface TranscriptSegment {
  id: string;
  start: number;
  end: number;
  text: string;
  words: Word[];
}

export interface Transcript {
  filename?: string;
  language?: string;
  // Length of the transcribed source in seconds
  duration: number;
  segments: TranscriptSegment[];
}

/**
 * A maximal run of transcript segments with no internal gap reaching the
 * silence threshold.
 */
export interface Paragraph {
  index: number;
  start: number;
  end: number;
  text: string;
  segmentIds: string[];
}

/** Paragraph indices judged to be takes of the same content. */
export interface DuplicateGroup {
  paragraphIndices: number[];
  reason?: string;
}
