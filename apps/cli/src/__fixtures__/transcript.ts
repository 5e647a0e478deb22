import type { Transcript } from "@cutline/core";

/**
 * Thirty seconds of source with two spoken takes: [2, 4] and [10, 12].
 */
export const createTalkTranscript = (): Transcript => ({
  filename: "take.mov",
  language: "en",
  duration: 30,
  segments: [
    {
      id: "segment-0",
      start: 2,
      end: 4,
      text: "Hello there.",
      words: [
        { text: "Hello", start: 2, end: 2.5 },
        { text: "there.", start: 2.5, end: 4 },
      ],
    },
    {
      id: "segment-1",
      start: 10,
      end: 12,
      text: "Hello again.",
      words: [
        { text: "Hello", start: 10, end: 10.5 },
        { text: "again.", start: 10.5, end: 12 },
      ],
    },
  ],
});
