import { describe, expect, it } from "vitest";
import { loadAIConfig } from "./config";

describe("loadAIConfig", () => {
  it("defaults to OpenAI models", () => {
    expect(loadAIConfig({})).toEqual({
      provider: "openai",
      llmModel: "gpt-4o-mini",
      transcriptionModel: "whisper-1",
      openaiApiKey: undefined,
      openaiBaseUrl: undefined,
      googleApiKey: undefined,
    });
  });

  it("picks the default model of the chosen provider", () => {
    expect(
      loadAIConfig({
        CUTLINE_LLM_PROVIDER: "google",
        GOOGLE_GENERATIVE_AI_API_KEY: "test-key",
      })
    ).toMatchObject({ provider: "google", llmModel: "gemini-2.5-flash", googleApiKey: "test-key" });
  });

  it("treats empty values as unset", () => {
    expect(
      loadAIConfig({ CUTLINE_LLM_MODEL: "", OPENAI_BASE_URL: "", CUTLINE_TRANSCRIPTION_MODEL: "" })
    ).toMatchObject({
      llmModel: "gpt-4o-mini",
      openaiBaseUrl: undefined,
      transcriptionModel: "whisper-1",
    });
  });

  it("rejects an unknown provider", () => {
    expect(() => loadAIConfig({ CUTLINE_LLM_PROVIDER: "acme" })).toThrow();
  });
});
