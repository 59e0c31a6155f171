export type {
  DatabaseOptions,
  PropertyDatabase,
  PropertySummary,
  UcdFileName,
} from "./database.ts";
export {
  UCD_FILES,
  createPropertyDatabase,
  describePropertyDatabase,
  missingProperties,
} from "./database.ts";
export type { LoadDatabaseOptions } from "./load.ts";
export { REQUIRED_UCD_FILES, loadPropertyDatabase } from "./load.ts";
export type { UcdRecord } from "./parse.ts";
export { parseUcdRecords } from "./parse.ts";
