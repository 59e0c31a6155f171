import { assertCodePoint } from "../core/codepoint.ts";
import { CellwidthError } from "../core/error.ts";
import type { RangeEntry, RangeTable } from "../unicode/lookup.ts";
import { buildRangeTable, lookupProperty, rangeCount } from "../unicode/lookup.ts";
import {
  EAW_PROPERTY_NAMES,
  GC_PROPERTY_NAMES,
  GCB_PROPERTY_NAMES,
  INCB_PROPERTY_NAMES,
  PROPERTY_NAMES,
} from "../unicode/properties.ts";
import type { EmojiPropertyName, PropertyName, PropertyValueMap } from "../unicode/properties.ts";
import type { UnicodeVersion } from "../unicode/version.ts";
import { formatUnicodeVersion, parseUnicodeVersion } from "../unicode/version.ts";
import { deriveIncbEntries } from "./incb.ts";
import type { UcdRecord } from "./parse.ts";
import { parseUcdRecords } from "./parse.ts";

/**
 * UCD files a database is built from.
 */
export const UCD_FILES = {
  graphemeBreak: "GraphemeBreakProperty.txt",
  emojiData: "emoji-data.txt",
  derivedCore: "DerivedCoreProperties.txt",
  combiningClass: "DerivedCombiningClass.txt",
  syllabicCategory: "IndicSyllabicCategory.txt",
  scripts: "Scripts.txt",
  eastAsianWidth: "EastAsianWidth.txt",
  generalCategory: "DerivedGeneralCategory.txt",
} as const;

export type UcdFileName = (typeof UCD_FILES)[keyof typeof UCD_FILES];

/**
 * PropertyDatabase is a read-only, versioned view of Unicode character
 * properties. Lookups are total for valid code points: a property the
 * database lacks answers with its default value.
 */
export interface PropertyDatabase {
  readonly version: UnicodeVersion;
  has(property: PropertyName): boolean;
  lookup<P extends PropertyName>(codePoint: number, property: P): PropertyValueMap[P];
}

/**
 * PropertySummary reports one property's availability and table size.
 */
export interface PropertySummary {
  property: PropertyName;
  available: boolean;
  derived: boolean;
  ranges: number;
}

/**
 * DatabaseOptions defines the inputs of createPropertyDatabase.
 */
export interface DatabaseOptions {
  version: string | UnicodeVersion;
  files: Partial<Record<UcdFileName, string>>;
}

interface PropertyTable<V> {
  values: readonly V[];
  fallback: V;
  ranges: RangeTable;
  available: boolean;
  derived: boolean;
}

type PropertyTables = { [P in PropertyName]: PropertyTable<PropertyValueMap[P]> };

const EMPTY_TABLE: RangeTable = new Int32Array(0);
const BOOLEAN_VALUES = [false, true] as const;
const COMBINING_CLASS_VALUES: readonly number[] = Array.from({ length: 256 }, (_, index) => index);

function missingTable<V>(values: readonly V[], fallback: V): PropertyTable<V> {
  return { values, fallback, ranges: EMPTY_TABLE, available: false, derived: false };
}

function toEntry(record: UcdRecord, value: number): RangeEntry {
  return { first: record.first, last: record.last, value };
}

function unknownValue(file: string, record: UcdRecord, value: string): CellwidthError {
  return new CellwidthError(
    "UCD_MALFORMED_RECORD",
    `Unknown property value "${value}" in ${file} on line ${record.line}`,
    { file, line: record.line, value },
  );
}

function splitRecords(
  text: string,
  toValue: (record: UcdRecord) => number | undefined,
): { defaults: RangeEntry[]; records: RangeEntry[] } {
  const defaults: RangeEntry[] = [];
  const records: RangeEntry[] = [];
  for (const record of parseUcdRecords(text)) {
    const value = toValue(record);
    if (value === undefined) continue;
    (record.kind === "default" ? defaults : records).push(toEntry(record, value));
  }
  return { defaults, records };
}

function enumeratedTable<V extends string>(
  file: string,
  text: string | undefined,
  values: readonly V[],
  field = 0,
  select?: (record: UcdRecord) => boolean,
): PropertyTable<V> {
  const fallback = values[0];
  if (fallback === undefined) throw new RangeError(`${file}: empty value list`);
  if (text === undefined) return missingTable(values, fallback);
  const { defaults, records } = splitRecords(text, (record) => {
    if (select && !select(record)) return undefined;
    const name = record.fields[field] ?? "";
    const id = values.findIndex((value) => value === name);
    if (id < 0) throw unknownValue(file, record, name);
    return id;
  });
  return {
    values,
    fallback,
    ranges: buildRangeTable(defaults, records),
    available: true,
    derived: false,
  };
}

function openTable(
  text: string | undefined,
  fallback: string,
): PropertyTable<string> {
  if (text === undefined) return missingTable([fallback], fallback);
  const values: string[] = [fallback];
  const ids = new Map<string, number>([[fallback, 0]]);
  const { defaults, records } = splitRecords(text, (record) => {
    const name = record.fields[0] ?? fallback;
    let id = ids.get(name);
    if (id === undefined) {
      id = values.length;
      values.push(name);
      ids.set(name, id);
    }
    return id;
  });
  return {
    values,
    fallback,
    ranges: buildRangeTable(defaults, records),
    available: true,
    derived: false,
  };
}

function combiningClassTable(file: string, text: string | undefined): PropertyTable<number> {
  if (text === undefined) return missingTable(COMBINING_CLASS_VALUES, 0);
  const { defaults, records } = splitRecords(text, (record) => {
    const raw = record.fields[0] ?? "";
    const value = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
    if (!(value >= 0 && value <= 255)) throw unknownValue(file, record, raw);
    return value;
  });
  return {
    values: COMBINING_CLASS_VALUES,
    fallback: 0,
    ranges: buildRangeTable(defaults, records),
    available: true,
    derived: false,
  };
}

function emojiTable(
  text: string | undefined,
  property: EmojiPropertyName,
): PropertyTable<boolean> {
  if (text === undefined) return missingTable(BOOLEAN_VALUES, false);
  const { defaults, records } = splitRecords(text, (record) => {
    if (record.fields[0] !== property) return undefined;
    if (record.kind === "default") return record.fields[1] === "Yes" ? 1 : 0;
    return 1;
  });
  return {
    values: BOOLEAN_VALUES,
    fallback: false,
    ranges: buildRangeTable(defaults, records),
    available: true,
    derived: false,
  };
}

function incbTable(
  text: string | undefined,
  tables: Omit<PropertyTables, "Indic_Conjunct_Break">,
): PropertyTable<PropertyValueMap["Indic_Conjunct_Break"]> {
  const file = UCD_FILES.derivedCore;
  const values = INCB_PROPERTY_NAMES;
  if (text !== undefined && /^[^#]*;\s*InCB\s*;/m.test(text)) {
    return enumeratedTable(file, text, values, 1, (record) => record.fields[0] === "InCB");
  }
  const syllabic = tables.Indic_Syllabic_Category;
  const script = tables.Script;
  const combining = tables.Canonical_Combining_Class;
  const graphemeBreak = tables.Grapheme_Cluster_Break;
  if (!(syllabic.available && script.available && combining.available && graphemeBreak.available)) {
    return missingTable(values, "None");
  }
  const entries = deriveIncbEntries(
    {
      syllabicCategory: syllabic,
      script,
      combiningClass: combining.ranges,
      graphemeBreakExtend: {
        ranges: graphemeBreak.ranges,
        extendId: GCB_PROPERTY_NAMES.indexOf("Extend"),
      },
    },
    {
      consonant: values.indexOf("Consonant"),
      extend: values.indexOf("Extend"),
      linker: values.indexOf("Linker"),
    },
  );
  return {
    values,
    fallback: "None",
    ranges: buildRangeTable([], entries),
    available: true,
    derived: true,
  };
}

function buildTables(files: DatabaseOptions["files"]): PropertyTables {
  const emojiData = files[UCD_FILES.emojiData];
  const base = {
    Grapheme_Cluster_Break: enumeratedTable(
      UCD_FILES.graphemeBreak,
      files[UCD_FILES.graphemeBreak],
      GCB_PROPERTY_NAMES,
    ),
    Extended_Pictographic: emojiTable(emojiData, "Extended_Pictographic"),
    Emoji: emojiTable(emojiData, "Emoji"),
    Emoji_Presentation: emojiTable(emojiData, "Emoji_Presentation"),
    Canonical_Combining_Class: combiningClassTable(
      UCD_FILES.combiningClass,
      files[UCD_FILES.combiningClass],
    ),
    Indic_Syllabic_Category: openTable(files[UCD_FILES.syllabicCategory], "Other"),
    Script: openTable(files[UCD_FILES.scripts], "Unknown"),
    East_Asian_Width: enumeratedTable(
      UCD_FILES.eastAsianWidth,
      files[UCD_FILES.eastAsianWidth],
      EAW_PROPERTY_NAMES,
    ),
    General_Category: enumeratedTable(
      UCD_FILES.generalCategory,
      files[UCD_FILES.generalCategory],
      GC_PROPERTY_NAMES,
    ),
  };
  return { ...base, Indic_Conjunct_Break: incbTable(files[UCD_FILES.derivedCore], base) };
}

class TablePropertyDatabase implements PropertyDatabase {
  readonly version: UnicodeVersion;
  private readonly tables: PropertyTables;

  constructor(version: UnicodeVersion, tables: PropertyTables) {
    this.version = version;
    this.tables = tables;
  }

  has(property: PropertyName): boolean {
    return this.tables[property].available;
  }

  lookup<P extends PropertyName>(codePoint: number, property: P): PropertyValueMap[P] {
    assertCodePoint(codePoint);
    const table = this.tables[property];
    return table.values[lookupProperty(table.ranges, codePoint)] ?? table.fallback;
  }

  summarize(): PropertySummary[] {
    return PROPERTY_NAMES.map((property) => {
      const table = this.tables[property];
      return {
        property,
        available: table.available,
        derived: table.derived,
        ranges: rangeCount(table.ranges),
      };
    });
  }
}

/**
 * Build a property database from the text of UCD files.
 * Files that are absent leave their properties unavailable.
 */
export function createPropertyDatabase(options: DatabaseOptions): PropertyDatabase {
  const version = parseUnicodeVersion(options.version);
  return new TablePropertyDatabase(version, buildTables(options.files));
}

/**
 * Per-property availability and range counts of a database.
 */
export function describePropertyDatabase(database: PropertyDatabase): PropertySummary[] {
  if (database instanceof TablePropertyDatabase) return database.summarize();
  return PROPERTY_NAMES.map((property) => ({
    property,
    available: database.has(property),
    derived: false,
    ranges: 0,
  }));
}

/**
 * Human-readable label such as `UCD 15.1.0`.
 */
export function databaseLabel(database: PropertyDatabase): string {
  return `UCD ${formatUnicodeVersion(database.version)}`;
}

/**
 * Names of the properties a consumer needs that the database lacks.
 */
export function missingProperties(
  database: PropertyDatabase,
  required: readonly PropertyName[],
): PropertyName[] {
  return required.filter((property) => !database.has(property));
}

/**
 * Throw UNSUPPORTED_UNICODE_VERSION when the database lacks a required property.
 */
export function requireProperties(
  database: PropertyDatabase,
  required: readonly PropertyName[],
  consumer: string,
): void {
  const missing = missingProperties(database, required);
  if (missing.length === 0) return;
  throw new CellwidthError(
    "UNSUPPORTED_UNICODE_VERSION",
    `${databaseLabel(database)} lacks ${missing.join(", ")} required by ${consumer}`,
    { version: formatUnicodeVersion(database.version), missing },
  );
}
