import fs from "node:fs/promises";
import path from "node:path";

export const fileExists = async (filePath: string) => {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
};

/**
 * Reads and parses a JSON file; `null` when the file does not exist.
 * Parse failures propagate as SyntaxError.
 */
export const readJSON = async (filePath: string): Promise<unknown> => {
  if (!(await fileExists(filePath))) {
    return null;
  }

  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content);
};

export const writeJSON = async <T>(filePath: string, data: T) => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
};
