/**
 * File System Utilities
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads and parses a JSON file. Read and syntax errors propagate.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await fsPromises.readFile(filePath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return parsed;
}
