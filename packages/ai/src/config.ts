import { z } from "zod";

export const LLM_PROVIDERS = ["openai", "google"] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

const DEFAULT_LLM_MODELS: Record<LLMProvider, string> = {
  openai: "gpt-4o-mini",
  google: "gemini-2.5-flash",
};

export const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";

// `KEY=` in a .env file yields an empty string
export const blankAsUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === "" ? undefined : value), schema);

const aiEnvSchema = z.object({
  CUTLINE_LLM_PROVIDER: blankAsUndefined(z.enum(LLM_PROVIDERS).default("openai")),
  CUTLINE_LLM_MODEL: blankAsUndefined(z.string().optional()),
  CUTLINE_TRANSCRIPTION_MODEL: blankAsUndefined(
    z.string().default(DEFAULT_TRANSCRIPTION_MODEL)
  ),
  OPENAI_API_KEY: blankAsUndefined(z.string().optional()),
  OPENAI_BASE_URL: blankAsUndefined(z.string().url().optional()),
  GOOGLE_GENERATIVE_AI_API_KEY: blankAsUndefined(z.string().optional()),
});

export interface AIConfig {
  provider: LLMProvider;
  llmModel: string;
  // Transcription always goes through the OpenAI-compatible endpoint
  transcriptionModel: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  googleApiKey?: string;
}

/**
 * Reads model settings from the environment. Called per request rather than
 * at import time so a `.env` loaded by the entry point is visible.
 */
export const loadAIConfig = (
  env: Record<string, string | undefined> = process.env
): AIConfig => {
  const parsed = aiEnvSchema.parse(env);
  return {
    provider: parsed.CUTLINE_LLM_PROVIDER,
    llmModel: parsed.CUTLINE_LLM_MODEL ?? DEFAULT_LLM_MODELS[parsed.CUTLINE_LLM_PROVIDER],
    transcriptionModel: parsed.CUTLINE_TRANSCRIPTION_MODEL,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    googleApiKey: parsed.GOOGLE_GENERATIVE_AI_API_KEY,
  };
};
