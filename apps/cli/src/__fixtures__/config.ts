import { createCapabilities, type AllowedTargets } from "@cutline/core";
import type { CutlineConfig } from "../config";

export const createTestConfig = (allowedTargets: AllowedTargets = "capcut"): CutlineConfig => ({
  capabilities: createCapabilities(allowedTargets),
  silenceThresholdSec: 3,
  minSegmentDurationSec: 0.5,
  subtitleMaxWords: 8,
  subtitleMaxChars: 45,
  ai: {
    provider: "openai",
    llmModel: "test-model",
    transcriptionModel: "whisper-1",
    openaiApiKey: "test-key",
  },
});
