import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { AIConfig } from "../config";

// Create OpenAI client
export const createOpenAIClient = (config: AIConfig) =>
  createOpenAI({
    baseURL: config.openaiBaseUrl,
    apiKey: config.openaiApiKey,
  });

// Create Google AI client
export const createGeminiClient = (config: AIConfig) =>
  createGoogleGenerativeAI({
    apiKey: config.googleApiKey,
  });

/** Chat model for the configured provider. */
export const createLanguageModel = (config: AIConfig): LanguageModel =>
  config.provider === "google"
    ? createGeminiClient(config)(config.llmModel)
    : createOpenAIClient(config)(config.llmModel);
