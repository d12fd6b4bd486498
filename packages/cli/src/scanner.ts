import fs from "fs/promises";
import path from "path";

const SKIPPED_DIRECTORIES = new Set(["assets"]);

/**
 * Collect documentation pages under `root`, sorted. The site's own
 * `index.html` at the root is a landing page and is left out; nested
 * `index.html` files are method pages.
 */
export async function scanHtmlFiles(root: string): Promise<string[]> {
  const files: string[] = [];
  const rootDirectory = path.resolve(root);

  const walk = async (directory: string): Promise<void> => {
    let entries;
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new Error(
        `Failed to read directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name.toLowerCase())) {
          await walk(fullPath);
        }
        continue;
      }

      const name = entry.name.toLowerCase();
      if (!entry.isFile() || !name.endsWith(".html")) continue;
      if (name === "index.html" && directory === rootDirectory) continue;

      files.push(fullPath);
    }
  };

  await walk(rootDirectory);
  return files.sort();
}
