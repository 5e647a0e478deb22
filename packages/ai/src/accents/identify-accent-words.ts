import { generateObject } from "ai";
import { z } from "zod";
import { loadAIConfig, type AIConfig } from "../config";
import { createLanguageModel } from "../lib/ai-clients";

const MAX_ACCENT_WORDS = 4;
const MIN_WORDS_FOR_ACCENT = 3;

const accentWordsSchema = z.object({
  accentWords: z
    .array(z.string())
    .describe("Words to emphasize, exactly as they appear in the text"),
});

const SYSTEM_PROMPT = `You are a subtitle styling assistant. Identify 2-4 key words in a subtitle line that should be highlighted in a different colour.

Rules:
- Choose important nouns, verbs or key terms that carry the core meaning.
- Do not pick common words such as "the", "is", "a".
- Return words exactly as they appear in the text (same case, same form).`;

/**
 * Words of a subtitle line worth highlighting. Short lines get none, and a
 * failed request yields none rather than failing the subtitle pass.
 */
export async function identifyAccentWords(
  text: string,
  config: AIConfig = loadAIConfig()
): Promise<string[]> {
  const trimmed = text.trim();
  if (trimmed.split(/\s+/).filter(Boolean).length < MIN_WORDS_FOR_ACCENT) {
    return [];
  }

  try {
    const { object } = await generateObject({
      model: createLanguageModel(config),
      schema: accentWordsSchema,
      system: SYSTEM_PROMPT,
      prompt: `Text: ${JSON.stringify(trimmed)}`,
      temperature: 0.3,
      maxRetries: 2,
    });

    // Only words that can actually be located in the line are useful
    return [...new Set(object.accentWords.map((word) => word.trim()))]
      .filter((word) => word && trimmed.includes(word))
      .slice(0, MAX_ACCENT_WORDS);
  } catch (error) {
    console.error("[Accent Words Error]", {
      error: error instanceof Error ? error.message : "Unknown accent words error",
      model: config.llmModel,
      text: trimmed,
      timestamp: new Date().toISOString(),
    });
    return [];
  }
}

export async function identifyAccentWordsBatch(
  texts: string[],
  config: AIConfig = loadAIConfig()
): Promise<string[][]> {
  const results: string[][] = [];
  for (const text of texts) {
    results.push(await identifyAccentWords(text, config));
  }
  return results;
}
