import { readFile, readdir, stat } from "fs/promises";
import path from "path";
import { logger } from "../utils/logger";

export const DEFAULT_MD_FILES = [
  "goals.md",
  "skills.md",
  "injuries.md",
  "availability.md",
];

export const NO_YAML_FOLDER = "(No YAML folder found. Skipping.)";
export const NO_YAML_FILES = "(No YAML files found. Skipping.)";

export interface YamlContextOptions {
  maxFiles?: number;
  maxCharsPerFile?: number;
}

const YAML_EXTENSIONS = [".yml", ".yaml"];

const byCodePoint = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const isDirectory = async (dir: string): Promise<boolean> => {
  try {
    return (await stat(dir)).isDirectory();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
};

const isRegularFile = async (file: string): Promise<boolean> => {
  try {
    return (await stat(file)).isFile();
  } catch (error) {
    if (isMissing(error)) {
      return false;
    }
    throw error;
  }
};

const isMissing = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "ENOENT" || error.code === "ENOTDIR");

/**
 * Reads the Markdown notes and the YAML session history of a coaching vault
 * and flattens them into the text blocks the coach prompt embeds.
 */
export class VaultLoader {
  async readText(file: string): Promise<string> {
    return readFile(file, { encoding: "utf-8" });
  }

  /**
   * Concatenates the named Markdown files in order. A missing file leaves a
   * `MISSING` marker in place of its content instead of failing.
   */
  async loadMarkdownContext(dataDir: string, files: string[]): Promise<string> {
    const chunks: string[] = [];

    for (const name of files) {
      const file = path.join(dataDir, name);
      try {
        const text = await this.readText(file);
        chunks.push(`--- ${name} ---\n${text}\n`);
      } catch (error) {
        if (!isMissing(error)) {
          throw error;
        }
        logger.warn(`Vault note missing: ${file}`);
        chunks.push(`--- ${name} (MISSING: ${file}) ---\n`);
      }
    }

    return chunks.join("\n").trim();
  }

  /** YAML files of the folder, symlinked ones included, sorted by path. */
  async listYamlFiles(yamlDir: string): Promise<string[]> {
    const names = await readdir(yamlDir);
    const files: string[] = [];
    for (const name of names) {
      if (!YAML_EXTENSIONS.some((ext) => name.endsWith(ext))) continue;
      const file = path.join(yamlDir, name);
      if (await isRegularFile(file)) {
        files.push(file);
      }
    }
    return files.sort(byCodePoint);
  }

  async loadYamlContext(
    yamlDir: string,
    { maxFiles = 50, maxCharsPerFile = 12000 }: YamlContextOptions = {}
  ): Promise<string> {
    if (!(await isDirectory(yamlDir))) {
      return NO_YAML_FOLDER;
    }

    const yamlFiles = await this.listYamlFiles(yamlDir);
    if (yamlFiles.length === 0) {
      return NO_YAML_FILES;
    }

    const chunks: string[] = [];
    for (const file of yamlFiles.slice(0, maxFiles)) {
      let text = await this.readText(file);
      // code points, not UTF-16 units
      const chars = Array.from(text);
      if (chars.length > maxCharsPerFile) {
        text = chars.slice(0, maxCharsPerFile).join("") + "\n... (truncated)\n";
      }
      chunks.push(`--- ${path.basename(file)} ---\n${text}\n`);
    }

    if (yamlFiles.length > maxFiles) {
      chunks.push(
        `... (${yamlFiles.length - maxFiles} more YAML files not included)\n`
      );
    }

    logger.debug(
      `Loaded ${Math.min(yamlFiles.length, maxFiles)} of ${yamlFiles.length} YAML sessions from ${yamlDir}`
    );
    return chunks.join("\n").trim();
  }

  /** Returns the note's text, or `null` when the file does not exist. */
  async readOptional(file: string): Promise<string | null> {
    try {
      return await this.readText(file);
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }
}

export const vaultLoader = new VaultLoader();
