import { CellwidthError } from "../core/error.ts";
import type { ClusterSpan, CodePointInput } from "../core/types.ts";
import type { PropertyDatabase } from "../ucd/database.ts";
import { requireProperties } from "../ucd/database.ts";
import type { PropertyName } from "../unicode/properties.ts";
import { CodePoints } from "../unicode/properties.ts";
import { segmentGraphemes } from "../segment/grapheme.ts";

/**
 * Columns a cluster occupies.
 */
export type CellWidth = 0 | 1 | 2;

/**
 * WidthOptions defines an exported structural contract.
 * `ambiguousWidth` is the column count for East_Asian_Width=A and
 * defaults to 1.
 */
export interface WidthOptions {
  database: PropertyDatabase;
  ambiguousWidth?: 1 | 2;
}

export const REQUIRED_WIDTH_PROPERTIES: readonly PropertyName[] = [
  "East_Asian_Width",
  "General_Category",
  "Emoji_Presentation",
  "Extended_Pictographic",
];

function hasEmojiPresentation(database: PropertyDatabase, codePoints: readonly number[]): boolean {
  const [base] = codePoints;
  if (base === undefined) return false;
  if (!database.lookup(base, "Extended_Pictographic") && !database.lookup(base, "Emoji")) {
    return false;
  }
  if (codePoints[1] === CodePoints.TEXT_VARIATION_SELECTOR) return false;
  return codePoints.some(
    (codePoint) =>
      codePoint === CodePoints.EMOJI_VARIATION_SELECTOR ||
      database.lookup(codePoint, "Emoji_Presentation"),
  );
}

function isZeroWidth(database: PropertyDatabase, codePoint: number): boolean {
  if (codePoint === CodePoints.NUL) return true;
  if (
    codePoint >= CodePoints.HANGUL_JUNGSEONG_FILLER &&
    codePoint <= CodePoints.HANGUL_JONGSEONG_SSANGNIEUN
  ) {
    return true;
  }
  switch (database.lookup(codePoint, "General_Category")) {
    case "Cc":
    case "Mn":
    case "Me":
      return true;
    case "Cf":
      return codePoint !== CodePoints.SOFT_HYPHEN;
    default:
      return false;
  }
}

function clusterCodePoints(cluster: ClusterSpan | readonly number[]): readonly number[] {
  return "codePoints" in cluster ? cluster.codePoints : cluster;
}

/**
 * Display width of one grapheme cluster.
 * Only the first code point's East_Asian_Width and General_Category count;
 * the emoji check looks at every code point. U+FE0E right after the base
 * selects text presentation and skips the emoji check.
 * Units: terminal columns.
 */
export function clusterWidth(
  cluster: ClusterSpan | readonly number[],
  options: WidthOptions,
): CellWidth {
  const { database } = options;
  const codePoints = clusterCodePoints(cluster);
  const [base] = codePoints;
  if (base === undefined) {
    throw new CellwidthError("EMPTY_CLUSTER", "Cannot measure an empty grapheme cluster");
  }
  requireProperties(database, REQUIRED_WIDTH_PROPERTIES, "width calculation");

  if (hasEmojiPresentation(database, codePoints)) return 2;
  if (isZeroWidth(database, base)) return 0;
  if (database.lookup(base, "General_Category") === "Cn") return 1;

  switch (database.lookup(base, "East_Asian_Width")) {
    case "F":
    case "W":
      return 2;
    case "A":
      return options.ambiguousWidth ?? 1;
    default:
      return 1;
  }
}

/**
 * Width of a code point on its own.
 * Units: terminal columns.
 */
export function codePointWidth(codePoint: number, options: WidthOptions): CellWidth {
  return clusterWidth([codePoint], options);
}

/**
 * Total columns of the input's grapheme clusters.
 * Units: terminal columns.
 */
export function displayWidth(input: CodePointInput, options: WidthOptions): number {
  let total = 0;
  for (const span of segmentGraphemes(input, { database: options.database })) {
    total += clusterWidth(span, options);
  }
  return total;
}
