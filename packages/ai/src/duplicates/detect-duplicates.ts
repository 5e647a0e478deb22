import { generateObject } from "ai";
import { z } from "zod";
import type { DuplicateGroup, Paragraph } from "@cutline/core";
import { loadAIConfig, type AIConfig } from "../config";
import { createLanguageModel } from "../lib/ai-clients";

const duplicateGroupsSchema = z.object({
  groups: z.array(
    z.object({
      blockIds: z
        .array(z.number().int())
        .describe("Ids of blocks that are takes of the same content"),
      reason: z.string().describe("Short explanation, e.g. 'three attempts at the intro'"),
    })
  ),
});

export type RawDuplicateGroup = z.infer<typeof duplicateGroupsSchema>["groups"][number];

const SYSTEM_PROMPT = `You are a video editing assistant that identifies duplicate takes in transcripts.

The speaker often repeats the same phrase several times (multiple takes); the last take is always the best one. You receive consecutive text blocks separated by pauses. Group the blocks that are takes of the same content.

Rules:
- Only group blocks that are clearly attempts at saying the same thing.
- Leave unique content (not a retry) out of every group.
- A block belongs to at most one group.
- Be conservative: only group blocks when you are confident.
- Return {"groups": []} when there are no duplicates.`;

/**
 * Cleans model output into groups the cut plan builder accepts: indices in
 * range and unique, at least two per group, no index in two groups. Groups
 * that break a rule are dropped whole.
 */
export const normalizeDuplicateGroups = (
  groups: RawDuplicateGroup[],
  paragraphCount: number
): DuplicateGroup[] => {
  const claimed = new Set<number>();
  const result: DuplicateGroup[] = [];

  for (const group of groups) {
    const indices = [...new Set(group.blockIds)].sort((a, b) => a - b);
    const valid = indices.every(
      (index) =>
        Number.isInteger(index) && index >= 0 && index < paragraphCount && !claimed.has(index)
    );
    if (!valid || indices.length < 2) {
      continue;
    }
    indices.forEach((index) => claimed.add(index));
    const reason = group.reason.trim();
    result.push({ paragraphIndices: indices, ...(reason ? { reason } : {}) });
  }

  return result;
};

/**
 * Asks the language model which paragraphs are repeated takes. Detection is
 * advisory: any failure is logged and yields no groups.
 */
export async function detectDuplicateGroups(
  paragraphs: Paragraph[],
  config: AIConfig = loadAIConfig()
): Promise<DuplicateGroup[]> {
  if (paragraphs.length < 2) {
    return [];
  }

  const blocks = paragraphs
    .map((paragraph) => `[${paragraph.index}] ${JSON.stringify(paragraph.text)}`)
    .join("\n");
  const userMessage = `Blocks:\n${blocks}`;

  console.log("[Duplicate Detection Request]", {
    model: config.llmModel,
    paragraphCount: paragraphs.length,
    timestamp: new Date().toISOString(),
  });

  try {
    const { object } = await generateObject({
      model: createLanguageModel(config),
      schema: duplicateGroupsSchema,
      system: SYSTEM_PROMPT,
      prompt: userMessage,
      temperature: 0.1,
      maxRetries: 2,
    });

    const groups = normalizeDuplicateGroups(object.groups, paragraphs.length);

    console.log("[Duplicate Detection Response]", {
      success: true,
      returned: object.groups.length,
      accepted: groups.length,
      timestamp: new Date().toISOString(),
    });

    return groups;
  } catch (error) {
    console.error("[Duplicate Detection Error]", {
      error: error instanceof Error ? error.message : "Unknown duplicate detection error",
      model: config.llmModel,
      timestamp: new Date().toISOString(),
    });
    return [];
  }
}
