import { formatCodePoint } from "../core/codepoint.ts";
import { CellwidthError } from "../core/error.ts";

/**
 * RangeTable holds `(start, end, valueId)` triples sorted by start.
 */
export type RangeTable = Int32Array;

/**
 * RangeEntry is one inclusive code point range with a value id.
 * Units: Unicode scalar values.
 */
export interface RangeEntry {
  first: number;
  last: number;
  value: number;
}

/**
 * Lookup a property value for a Unicode scalar value in a range table.
 * Units: Unicode scalar values.
 */
export function lookupProperty(table: RangeTable, codePoint: number): number {
  let lo = 0;
  let hi = table.length / 3 - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const base = mid * 3;
    const start = table[base] ?? 0;
    const end = table[base + 1] ?? 0;
    if (codePoint < start) {
      hi = mid - 1;
    } else if (codePoint > end) {
      lo = mid + 1;
    } else {
      return table[base + 2] ?? 0;
    }
  }
  return 0;
}

/**
 * Number of ranges in a table.
 */
export function rangeCount(table: RangeTable): number {
  return table.length / 3;
}

function byFirst(left: RangeEntry, right: RangeEntry): number {
  return left.first - right.first;
}

function assertDisjoint(entries: readonly RangeEntry[]): void {
  for (let index = 1; index < entries.length; index += 1) {
    const previous = entries[index - 1];
    const current = entries[index];
    if (previous && current && current.first <= previous.last) {
      throw new CellwidthError(
        "UCD_MALFORMED_RECORD",
        `Range ${formatCodePoint(current.first)}..${formatCodePoint(current.last)} overlaps ` +
          `${formatCodePoint(previous.first)}..${formatCodePoint(previous.last)}`,
      );
    }
  }
}

/**
 * Overlay sorted, disjoint ranges on other sorted, disjoint ranges.
 * Where both cover a code point, `over` wins.
 */
export function overlayRanges(
  under: readonly RangeEntry[],
  over: readonly RangeEntry[],
): RangeEntry[] {
  const output: RangeEntry[] = [];
  let pointer = 0;
  for (const entry of under) {
    while (pointer < over.length && (over[pointer]?.last ?? 0) < entry.first) pointer += 1;
    let start = entry.first;
    for (let index = pointer; index < over.length; index += 1) {
      const cover = over[index];
      if (!cover || cover.first > entry.last) break;
      if (cover.first > start) output.push({ first: start, last: cover.first - 1, value: entry.value });
      start = Math.max(start, cover.last + 1);
    }
    if (start <= entry.last) output.push({ first: start, last: entry.last, value: entry.value });
  }
  output.push(...over);
  return output.sort(byFirst);
}

/**
 * Merge adjacent ranges that carry the same value.
 */
export function condenseRanges(entries: readonly RangeEntry[]): RangeEntry[] {
  const output: RangeEntry[] = [];
  for (const entry of entries) {
    const previous = output[output.length - 1];
    if (previous && previous.value === entry.value && previous.last + 1 === entry.first) {
      previous.last = entry.last;
    } else {
      output.push({ ...entry });
    }
  }
  return output;
}

/**
 * Build a range table from `@missing` defaults and explicit records.
 * Later defaults override earlier ones, and records override all defaults.
 * Ranges that resolve to value id 0 are left out, since lookups fall back to 0.
 */
export function buildRangeTable(
  defaults: readonly RangeEntry[],
  records: readonly RangeEntry[],
): RangeTable {
  let layered: RangeEntry[] = [];
  for (const entry of defaults) {
    layered = overlayRanges(layered, [entry]);
  }
  const sortedRecords = [...records].sort(byFirst);
  assertDisjoint(sortedRecords);
  const condensed = condenseRanges(overlayRanges(layered, sortedRecords)).filter(
    (entry) => entry.value !== 0,
  );
  const table = new Int32Array(condensed.length * 3);
  condensed.forEach((entry, index) => {
    table[index * 3] = entry.first;
    table[index * 3 + 1] = entry.last;
    table[index * 3 + 2] = entry.value;
  });
  return table;
}
