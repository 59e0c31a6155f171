import { CodePoints } from "../unicode/properties.ts";
import type { RangeEntry, RangeTable } from "../unicode/lookup.ts";
import { lookupProperty } from "../unicode/lookup.ts";

/**
 * Scripts whose viramas join consonants into conjuncts.
 */
export const CONJUNCT_SCRIPTS: ReadonlySet<string> = new Set([
  "Bengali",
  "Devanagari",
  "Gujarati",
  "Malayalam",
  "Oriya",
  "Telugu",
]);

/**
 * Tables the derivation reads, each with the value names its ids index.
 */
export interface IncbSources {
  syllabicCategory: { ranges: RangeTable; values: readonly string[] };
  script: { ranges: RangeTable; values: readonly string[] };
  combiningClass: RangeTable;
  graphemeBreakExtend: { ranges: RangeTable; extendId: number };
}

/**
 * Value ids the derived entries use.
 */
export interface IncbIds {
  consonant: number;
  extend: number;
  linker: number;
}

function* codePointsOf(table: RangeTable, valueId: number): Iterable<number> {
  for (let base = 0; base < table.length; base += 3) {
    if (table[base + 2] !== valueId) continue;
    const start = table[base] ?? 0;
    const end = table[base + 1] ?? -1;
    for (let codePoint = start; codePoint <= end; codePoint += 1) yield codePoint;
  }
}

/**
 * Derive Indic_Conjunct_Break entries from Indic_Syllabic_Category, Script,
 * Canonical_Combining_Class and Grapheme_Cluster_Break, for data sets that
 * predate the property.
 * Units: Unicode scalar values.
 */
export function deriveIncbEntries(sources: IncbSources, ids: IncbIds): RangeEntry[] {
  const entries: RangeEntry[] = [];
  const taken = new Set<number>();
  const scriptOf = (codePoint: number) =>
    sources.script.values[lookupProperty(sources.script.ranges, codePoint)] ?? "Unknown";

  const syllabic = sources.syllabicCategory;
  for (const [category, value] of [
    ["Virama", ids.linker],
    ["Consonant", ids.consonant],
  ] as const) {
    const categoryId = syllabic.values.indexOf(category);
    if (categoryId < 0) continue;
    for (const codePoint of codePointsOf(syllabic.ranges, categoryId)) {
      if (taken.has(codePoint) || !CONJUNCT_SCRIPTS.has(scriptOf(codePoint))) continue;
      entries.push({ first: codePoint, last: codePoint, value });
      taken.add(codePoint);
    }
  }

  const extend = sources.graphemeBreakExtend;
  for (const codePoint of codePointsOf(extend.ranges, extend.extendId)) {
    if (taken.has(codePoint)) continue;
    if (lookupProperty(sources.combiningClass, codePoint) === 0) continue;
    entries.push({ first: codePoint, last: codePoint, value: ids.extend });
    taken.add(codePoint);
  }
  if (!taken.has(CodePoints.ZERO_WIDTH_JOINER)) {
    entries.push({
      first: CodePoints.ZERO_WIDTH_JOINER,
      last: CodePoints.ZERO_WIDTH_JOINER,
      value: ids.extend,
    });
  }
  return entries;
}
