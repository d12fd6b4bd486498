import path from "path";
import fs from "fs/promises";
import { logger } from "./logger";

export function sanitizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_") // Replace non-alphanumeric characters with underscores
    .replace(/^_+|_+$/g, ""); // Remove leading/trailing underscores
}

/**
 * `get.user` -> `get_user.yaml`
 */
export function outputFileName(method: string, extension: string): string {
  return `${method.replace(/\./g, "_")}.${extension}`;
}

export function resolvePath(input: string): string {
  return path.isAbsolute(input) ? input : path.join(process.cwd(), input);
}

// Maps and Sets would otherwise serialize as {}
function debugReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  return value;
}

export async function saveDebugOutput(
  data: unknown,
  stageName: string,
  debugDir: string,
): Promise<void> {
  try {
    const filePath = path.join(debugDir, `${sanitizeName(stageName)}.json`);
    await fs.writeFile(filePath, JSON.stringify(data, debugReplacer, 2));
    logger.debug(`Saved debug JSON: ${filePath}`);
  } catch (error) {
    logger.warn(
      `Save debug failed (${stageName}): ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export async function createDebugDirectory(
  debugEnabled: boolean,
): Promise<string | null> {
  if (!debugEnabled) return null;

  try {
    const baseDebugDir = path.join(process.cwd(), ".debug");
    await fs.mkdir(baseDebugDir, { recursive: true });

    const now = new Date();
    const timestamp = now.toISOString().replace(/:/g, "-").replace(/\..+/, "");
    const debugDir = path.join(baseDebugDir, timestamp);
    await fs.mkdir(debugDir, { recursive: true });

    logger.info(`Debug output will be saved to ${debugDir}`);
    return debugDir;
  } catch (error) {
    logger.warn(
      `Debug dir init failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    return null;
  }
}
