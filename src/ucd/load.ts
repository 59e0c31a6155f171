import { readFile } from "node:fs/promises";
import path from "node:path";
import { CellwidthError } from "../core/error.ts";
import type { Logger } from "../logger.ts";
import { createLogger } from "../logger.ts";
import type { UnicodeVersion } from "../unicode/version.ts";
import { formatUnicodeVersion, parseUnicodeVersion } from "../unicode/version.ts";
import type { PropertyDatabase, UcdFileName } from "./database.ts";
import { UCD_FILES, createPropertyDatabase, describePropertyDatabase } from "./database.ts";

/**
 * Files without which neither the segmenter nor the width calculator works.
 */
export const REQUIRED_UCD_FILES: readonly UcdFileName[] = [
  UCD_FILES.graphemeBreak,
  UCD_FILES.eastAsianWidth,
  UCD_FILES.generalCategory,
];

/**
 * LoadDatabaseOptions defines where the UCD files live.
 * Files are read from `<root>/<version>/`.
 */
export interface LoadDatabaseOptions {
  root: string;
  version: string | UnicodeVersion;
  logger?: Logger;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readOptional(file: string): Promise<string | undefined> {
  try {
    return await readFile(file, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) return undefined;
    throw error;
  }
}

/**
 * Load a property database from UCD files on disk.
 */
export async function loadPropertyDatabase(
  options: LoadDatabaseOptions,
): Promise<PropertyDatabase> {
  const logger = options.logger ?? createLogger("ucd");
  const version = parseUnicodeVersion(options.version);
  const directory = path.join(options.root, formatUnicodeVersion(version));
  logger.info({ root: options.root, version: formatUnicodeVersion(version) }, "loading UCD files");

  const names = Object.values(UCD_FILES);
  const texts = await Promise.all(names.map((name) => readOptional(path.join(directory, name))));
  const files: Partial<Record<UcdFileName, string>> = {};
  names.forEach((name, index) => {
    const text = texts[index];
    if (text !== undefined) {
      files[name] = text;
    } else if (REQUIRED_UCD_FILES.includes(name)) {
      throw new CellwidthError("UCD_MISSING_FILE", `Missing ${name} in ${directory}`, {
        file: name,
        directory,
      });
    } else {
      logger.debug({ file: name, directory }, "optional UCD file not found");
    }
  });

  const database = createPropertyDatabase({ version, files });
  for (const summary of describePropertyDatabase(database)) {
    logger.debug(summary, "property table");
  }
  return database;
}
