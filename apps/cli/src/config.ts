import { z } from "zod";
import { blankAsUndefined, loadAIConfig, type AIConfig } from "@cutline/ai";
import { ALLOWED_TARGETS, createCapabilities, type Capabilities } from "@cutline/core";

const cliEnvSchema = z.object({
  CUTLINE_ALLOWED_TARGETS: blankAsUndefined(z.enum(ALLOWED_TARGETS).default("capcut")),
  CUTLINE_DRAFTS_DIR: blankAsUndefined(z.string().optional()),
  CUTLINE_SILENCE_THRESHOLD_SEC: blankAsUndefined(z.coerce.number().nonnegative().default(3.0)),
  CUTLINE_MIN_SEGMENT_SEC: blankAsUndefined(z.coerce.number().nonnegative().default(0.5)),
  CUTLINE_SUBTITLE_MAX_WORDS: blankAsUndefined(z.coerce.number().int().positive().default(8)),
  CUTLINE_SUBTITLE_MAX_CHARS: blankAsUndefined(z.coerce.number().int().positive().default(45)),
});

export interface CutlineConfig {
  capabilities: Capabilities;
  // Unset means the editor's platform default
  draftsDir?: string;
  silenceThresholdSec: number;
  minSegmentDurationSec: number;
  subtitleMaxWords: number;
  subtitleMaxChars: number;
  ai: AIConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): CutlineConfig => {
  const result = cliEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  let ai: AIConfig;
  try {
    ai = loadAIConfig(env);
  } catch (error) {
    throw new ConfigError(
      `Invalid AI configuration: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = result.data;
  return {
    capabilities: createCapabilities(parsed.CUTLINE_ALLOWED_TARGETS),
    draftsDir: parsed.CUTLINE_DRAFTS_DIR,
    silenceThresholdSec: parsed.CUTLINE_SILENCE_THRESHOLD_SEC,
    minSegmentDurationSec: parsed.CUTLINE_MIN_SEGMENT_SEC,
    subtitleMaxWords: parsed.CUTLINE_SUBTITLE_MAX_WORDS,
    subtitleMaxChars: parsed.CUTLINE_SUBTITLE_MAX_CHARS,
    ai,
  };
};
