import fs from "node:fs/promises";
import path from "node:path";
import { experimental_transcribe as transcribe } from "ai";
import {
  IOError,
  groupWordsIntoSegments,
  type Transcript,
  type Word,
} from "@cutline/core";
import { loadAIConfig, type AIConfig } from "../config";
import { createOpenAIClient } from "../lib/ai-clients";

// Upload limit of the transcription endpoint
export const MAX_TRANSCRIPTION_BYTES = 25 * 1024 * 1024;

export class TranscriptionInputTooLargeError extends IOError {
  constructor(filePath: string, size: number) {
    super(
      `${filePath} is ${(size / 1024 / 1024).toFixed(1)}MB; transcription accepts at most ${
        MAX_TRANSCRIPTION_BYTES / 1024 / 1024
      }MB. Extract or compress the audio track first.`,
      { path: filePath, expected: `<= ${MAX_TRANSCRIPTION_BYTES}`, actual: size }
    );
    this.name = "TranscriptionInputTooLargeError";
  }
}

export interface TranscribeAudioOptions {
  // ISO-639-1 code; detected when omitted
  language?: string;
  // Pause that ends a segment; word output has no punctuation to split on
  segmentGapSec?: number;
  config?: AIConfig;
}

/**
 * Transcribes an audio or video file with word timestamps and groups the
 * words into sentence segments.
 */
export async function transcribeAudio(
  filePath: string,
  options: TranscribeAudioOptions = {}
): Promise<Transcript> {
  const config = options.config ?? loadAIConfig();
  const { size } = await fs.stat(filePath);
  if (size > MAX_TRANSCRIPTION_BYTES) {
    throw new TranscriptionInputTooLargeError(filePath, size);
  }

  const audio = await fs.readFile(filePath);
  const client = createOpenAIClient(config);

  console.log("[Transcribe Request]", {
    model: config.transcriptionModel,
    file: filePath,
    bytes: size,
    language: options.language ?? "auto",
    timestamp: new Date().toISOString(),
  });

  try {
    const result = await transcribe({
      model: client.transcription(config.transcriptionModel),
      audio,
      providerOptions: {
        openai: {
          timestampGranularities: ["word"],
          ...(options.language ? { language: options.language } : {}),
        },
      },
      maxRetries: 3,
    });

    // With word granularity every returned segment is a single word
    const words: Word[] = result.segments
      .map((segment) => ({
        text: segment.text.trim(),
        start: segment.startSecond,
        end: segment.endSecond,
      }))
      .filter((word) => word.text.length > 0);

    const lastEnd = words[words.length - 1]?.end ?? 0;
    const transcript: Transcript = {
      filename: path.basename(filePath),
      language: result.language,
      duration: Math.max(result.durationInSeconds ?? 0, lastEnd),
      segments: groupWordsIntoSegments(words, { maxGapSec: options.segmentGapSec }),
    };

    console.log("[Transcribe Response]", {
      success: true,
      language: transcript.language,
      duration: transcript.duration,
      wordCount: words.length,
      segmentCount: transcript.segments.length,
      timestamp: new Date().toISOString(),
    });

    return transcript;
  } catch (error) {
    console.error("[Transcribe Error]", {
      error: error instanceof Error ? error.message : "Unknown transcription error",
      model: config.transcriptionModel,
      file: filePath,
      timestamp: new Date().toISOString(),
    });
    throw error;
  }
}
