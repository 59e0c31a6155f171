import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PropertyDatabase, UcdFileName } from "../../mod.ts";
import { UCD_FILES, loadPropertyDatabase, silentLogger } from "../../mod.ts";

/**
 * Directory holding `<version>/` folders of trimmed UCD files.
 */
export const FIXTURE_UCD_ROOT = fileURLToPath(new URL("../fixtures/ucd/", import.meta.url));

const databases = new Map<string, Promise<PropertyDatabase>>();

export function loadFixtureDatabase(version = "15.1.0"): Promise<PropertyDatabase> {
  let database = databases.get(version);
  if (!database) {
    database = loadPropertyDatabase({ root: FIXTURE_UCD_ROOT, version, logger: silentLogger() });
    databases.set(version, database);
  }
  return database;
}

export async function readFixtureFiles(
  version = "15.1.0",
): Promise<Partial<Record<UcdFileName, string>>> {
  const files: Partial<Record<UcdFileName, string>> = {};
  for (const name of Object.values(UCD_FILES)) {
    files[name] = await readFile(path.join(FIXTURE_UCD_ROOT, version, name), "utf8");
  }
  return files;
}
