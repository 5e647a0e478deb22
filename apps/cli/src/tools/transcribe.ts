import { createHash } from "node:crypto";
import path from "node:path";
import { transcribeAudio } from "@cutline/ai";
import type { AIConfig } from "@cutline/ai";
import { parseTranscript, readJSON, writeJSON, type Transcript } from "@cutline/core";

export interface TranscribeOptions {
  force?: boolean;
  language?: string;
  config?: AIConfig;
}

export interface OutputPaths {
  outputDir: string;
  transcriptFile: string;
  cutPlanFile: string;
  srtFile: string;
}

/**
 * Where results for an input file are cached:
 * `<outputRoot>/<file name>-<hash of its absolute path>/`. Same-named files in
 * different folders get different caches.
 */
export const getOutputPaths = (inputFile: string, outputRoot = "./output"): OutputPaths => {
  const extension = path.extname(inputFile);
  const filename = path.basename(inputFile, extension);
  const key = createHash("sha1").update(path.resolve(inputFile)).digest("hex").slice(0, 8);
  const outputDir = path.join(outputRoot, `${filename}-${key}`);

  return {
    outputDir,
    transcriptFile: path.join(outputDir, "transcript.json"),
    cutPlanFile: path.join(outputDir, "cut-plan.json"),
    srtFile: path.join(outputDir, `${filename}.srt`),
  };
};

/**
 * Transcribes `inputFile`, reusing the transcript cached in `transcriptFile`
 * unless `force` is set.
 */
export const transcribe = async (
  inputFile: string,
  transcriptFile: string,
  options: TranscribeOptions = {}
): Promise<Transcript> => {
  if (!options.force) {
    const cached = await readJSON(transcriptFile);
    if (cached) {
      console.log(`Using existing transcription from ${transcriptFile}`);
      return parseTranscript(cached);
    }
  }

  const transcript = await transcribeAudio(inputFile, {
    language: options.language,
    config: options.config,
  });

  if (!transcript.segments.length) {
    console.warn("[Transcribe] no speech found", { file: inputFile });
  }

  await writeJSON(transcriptFile, transcript);

  return transcript;
};
