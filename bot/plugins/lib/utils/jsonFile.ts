import { promises as fs } from "fs";
import * as path from "path";
import { ConfigLoadError, ConfigParseError } from "./errors.js";

/**
 * Parse JSON text, naming `source` in the error. A leading byte order mark is ignored.
 */
export function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text.replace(/^\uFEFF/, ""));
  } catch (error) {
    throw new ConfigParseError(source, error);
  }
}

/**
 * Read and parse a JSON file. Resolves undefined when the file does not exist.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw new ConfigLoadError(filePath, error);
  }
  return parseJson(text, filePath);
}

/**
 * Write pretty JSON to `<file>.tmp` then rename it over the target, so
 * readers never observe a half-written file.
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(value, null, 2) + "\n", "utf-8");
  await fs.rename(tmpPath, filePath);
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
