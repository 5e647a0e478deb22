import type { Word } from "../types/transcript";

const specialWords = new Set(["mrs.", "ms.", "mr.", "dr.", "prof.", "st."]);

/**
 * 判断文本是否以句末标点结尾（缩写如 "Dr." 除外）
 */
export function isEndOfSentence(text: string): boolean {
  const trimmed = text.trim();
  if (specialWords.has(trimmed.toLowerCase())) {
    return false;
  }
  return /([.?!。！？…)])$|(--)$/.test(trimmed);
}

/**
 * Joins word texts into readable text. Whisper-style words carry their own
 * leading whitespace; bare words get a single space between them.
 */
export function joinWordsText(words: Word[]): string {
  return words
    .map((word, index) => {
      if (index === 0 || /^\s/.test(word.text)) {
        return word.text;
      }
      return ` ${word.text}`;
    })
    .join("")
    .trim();
}
